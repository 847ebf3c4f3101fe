import { logTransition } from '../utils/logger'

export enum DispatchState {
  BUILT = 'BUILT',
  SUBMITTED = 'SUBMITTED',
  PENDING = 'PENDING',
  CONFIRMED = 'CONFIRMED',
  EXHAUSTED = 'EXHAUSTED',
  FAILED = 'FAILED'
}

const ALLOWED: Record<DispatchState, DispatchState[]> = {
  BUILT:     [DispatchState.SUBMITTED],
  SUBMITTED: [DispatchState.CONFIRMED, DispatchState.PENDING, DispatchState.FAILED],
  PENDING:   [DispatchState.CONFIRMED, DispatchState.EXHAUSTED],
  CONFIRMED: [],
  EXHAUSTED: [],
  FAILED:    []
}

export class StateMachine {
  can(from: DispatchState, to: DispatchState): boolean {
    return ALLOWED[from].includes(to)
  }
}

const sm = new StateMachine()

/**
 * Lifecycle of one dispatched transaction. Sync mode goes
 * BUILT -> SUBMITTED -> CONFIRMED | FAILED; async mode passes through PENDING
 * and ends in CONFIRMED or EXHAUSTED.
 */
export class DispatchLifecycle {
  private current = DispatchState.BUILT

  constructor(private readonly txHash: string, private readonly endpoint: string) {}

  get state(): DispatchState {
    return this.current
  }

  advance(to: DispatchState, attempt?: number): void {
    if (!sm.can(this.current, to)) {
      throw new Error(`illegal dispatch transition ${this.current} -> ${to} for ${this.txHash}`)
    }
    logTransition({ txHash: this.txHash, endpoint: this.endpoint, from: this.current, to, attempt })
    this.current = to
  }
}
