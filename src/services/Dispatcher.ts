import { AsyncSubmissionError, ReceiptTimeoutError, SyncSubmissionError, describeError } from '../errors'
import { DispatchLifecycle, DispatchState } from '../fsm/dispatchStateMachine'
import { getLogger } from '../utils/logger'
import { systemClock, type Clock } from '../utils/clock'
import type { ReceiptSummary, RpcEndpoint } from './RpcEndpoint'
import type { DispatchResult, SignedTransfer, SubmissionMode } from '../types'

export const MAX_RECEIPT_POLL_ATTEMPTS = 1000

export interface DispatchOptions {
  mode: SubmissionMode
  pollingIntervalMs: number
  maxPollAttempts?: number
}

/**
 * Dispatcher
 * Submits one signed transfer and times it until a receipt is observed.
 *  - sync: a single eth_sendRawTransactionSync call, the receipt comes back with it
 *  - async: eth_sendRawTransaction, then receipt polling at a constant interval
 * The two paths never share calls.
 */
export class Dispatcher {
  constructor(private readonly clock: Clock = systemClock) {}

  async dispatch(tx: SignedTransfer, endpoint: RpcEndpoint, opts: DispatchOptions): Promise<DispatchResult> {
    const lifecycle = new DispatchLifecycle(tx.hash, endpoint.name)
    if (opts.mode === 'sync') return this.sendSync(tx, endpoint, lifecycle)
    return this.sendAsync(tx, endpoint, opts, lifecycle)
  }

  private async sendSync(tx: SignedTransfer, endpoint: RpcEndpoint, lifecycle: DispatchLifecycle): Promise<DispatchResult> {
    lifecycle.advance(DispatchState.SUBMITTED)
    const sentAt = this.clock.now()
    let receipt: ReceiptSummary | null
    try {
      receipt = await endpoint.sendRawTransactionSync(tx.raw)
    } catch (e) {
      lifecycle.advance(DispatchState.FAILED)
      throw new SyncSubmissionError(`unable to send sync transaction ${tx.hash}`, { cause: e, context: { endpoint: endpoint.name } })
    }
    if (receipt === null) {
      lifecycle.advance(DispatchState.FAILED)
      throw new SyncSubmissionError(`unable to send sync transaction ${tx.hash}: receipt not found`, { context: { endpoint: endpoint.name } })
    }
    const confirmedAt = this.clock.now()
    lifecycle.advance(DispatchState.CONFIRMED)
    return this.toResult(tx, receipt, sentAt, confirmedAt)
  }

  private async sendAsync(
    tx: SignedTransfer,
    endpoint: RpcEndpoint,
    opts: DispatchOptions,
    lifecycle: DispatchLifecycle
  ): Promise<DispatchResult> {
    const maxAttempts = opts.maxPollAttempts ?? MAX_RECEIPT_POLL_ATTEMPTS
    lifecycle.advance(DispatchState.SUBMITTED)
    const sentAt = this.clock.now()
    try {
      await endpoint.sendRawTransaction(tx.raw)
    } catch (e) {
      lifecycle.advance(DispatchState.FAILED)
      throw new AsyncSubmissionError(`unable to send transaction ${tx.hash}`, { cause: e, context: { endpoint: endpoint.name } })
    }
    lifecycle.advance(DispatchState.PENDING)

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let receipt: ReceiptSummary | null = null
      try {
        receipt = await endpoint.getTransactionReceipt(tx.hash)
      } catch (e) {
        // nodes without the tx indexed yet may answer with an error instead of null
        getLogger().debug({ event: 'dispatch.poll_error', txHash: tx.hash, attempt, error: describeError(e) })
      }
      if (receipt !== null) {
        const confirmedAt = this.clock.now()
        lifecycle.advance(DispatchState.CONFIRMED, attempt)
        return this.toResult(tx, receipt, sentAt, confirmedAt)
      }
      if (attempt < maxAttempts) await this.clock.sleep(opts.pollingIntervalMs)
    }

    lifecycle.advance(DispatchState.EXHAUSTED, maxAttempts)
    throw new ReceiptTimeoutError(tx.hash, maxAttempts)
  }

  private toResult(tx: SignedTransfer, receipt: ReceiptSummary, sentAt: number, confirmedAt: number): DispatchResult {
    return {
      sentAt: new Date(sentAt),
      txHash: tx.hash,
      includedInBlock: receipt.blockNumber,
      inclusionDelayMs: Math.max(0, confirmedAt - sentAt)
    }
  }
}

export default Dispatcher
