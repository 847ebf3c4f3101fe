import { describeError } from '../errors'
import { getLogger, logCampaign, logDispatch, logError } from '../utils/logger'
import { systemClock, type Clock } from '../utils/clock'
import { Dispatcher } from './Dispatcher'
import { prepareTransfer } from './TxBuilder'
import type { RpcEndpoint } from './RpcEndpoint'
import type { StatsSink } from './StatsRecorder'
import { emptyResult, type Campaign, type NonceSource, type PacingPolicy, type RunContext, type SubmissionMode } from '../types'

export interface CampaignTarget {
  name: string
  endpoint: RpcEndpoint
  mode: SubmissionMode
  count: number
  pollingIntervalMs: number
  nonceSource: NonceSource
  pacing: PacingPolicy
}

export interface CampaignRunnerDeps {
  clock?: Clock
  dispatcher?: Dispatcher
  /** uniform in [0, 1), used for pacing jitter */
  random?: () => number
}

export function pacingDelay(policy: PacingPolicy, random: () => number): number {
  return policy.minDelayMs + Math.floor(random() * policy.jitterMs)
}

/**
 * CampaignRunner
 * Runs N strictly sequential build+dispatch iterations per target. A failed
 * iteration yields a zero-valued result and bumps the error counter; the
 * campaign always runs to its configured count.
 */
export class CampaignRunner {
  private readonly clock: Clock
  private readonly dispatcher: Dispatcher
  private readonly random: () => number

  constructor(private readonly ctx: RunContext, deps: CampaignRunnerDeps = {}) {
    this.clock = deps.clock ?? systemClock
    this.dispatcher = deps.dispatcher ?? new Dispatcher(this.clock)
    this.random = deps.random ?? Math.random
  }

  async run(target: CampaignTarget): Promise<Campaign> {
    const campaign: Campaign = { target: target.name, mode: target.mode, results: [], errors: 0 }
    getLogger().info({ event: 'campaign.start', endpoint: target.name, mode: target.mode, count: target.count })

    for (let i = 0; i < target.count; i++) {
      try {
        const tx = await prepareTransfer(this.ctx, target.endpoint, target.nonceSource)
        const result = await this.dispatcher.dispatch(tx, target.endpoint, {
          mode: target.mode,
          pollingIntervalMs: target.pollingIntervalMs
        })
        campaign.results.push(result)
        logDispatch({
          endpoint: target.name,
          mode: target.mode,
          iteration: i,
          txHash: result.txHash,
          block: result.includedInBlock,
          delay_ms: result.inclusionDelayMs
        })
      } catch (e) {
        campaign.errors += 1
        campaign.results.push(emptyResult())
        logDispatch({ endpoint: target.name, mode: target.mode, iteration: i, error: describeError(e) })
      }

      if (i < target.count - 1) {
        await this.clock.sleep(pacingDelay(target.pacing, this.random))
      }
    }

    logCampaign({ endpoint: target.name, mode: target.mode, count: target.count, errors: campaign.errors })
    return campaign
  }

  /**
   * Run targets in list order. Each finished campaign goes to the sink before
   * the settle delay, and the next target starts only after it.
   */
  async runAll(targets: CampaignTarget[], sink: StatsSink, settleDelayMs: number): Promise<Campaign[]> {
    const campaigns: Campaign[] = []
    for (let t = 0; t < targets.length; t++) {
      const campaign = await this.run(targets[t])
      campaigns.push(campaign)
      try {
        const file = await sink.record(campaign)
        getLogger().info({ event: 'campaign.recorded', endpoint: campaign.target, file })
      } catch (e) {
        logError(`failed to record campaign ${campaign.target}`, describeError(e))
        throw e
      }
      if (t < targets.length - 1) await this.clock.sleep(settleDelayMs)
    }
    return campaigns
  }
}

export default CampaignRunner
