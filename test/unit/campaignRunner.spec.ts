import { Transaction, Wallet } from 'ethers'
import { CampaignRunner, pacingDelay, type CampaignTarget } from '../../src/services/CampaignRunner'
import { Dispatcher } from '../../src/services/Dispatcher'
import type { StatsSink } from '../../src/services/StatsRecorder'
import { isEmptyResult, type Campaign, type RunContext } from '../../src/types'
import { FakeEndpoint, ManualClock } from '../helpers/fakes'

class MemorySink implements StatsSink {
  public readonly recorded: Array<{ campaign: Campaign; at: number }> = []
  constructor(private readonly clock: ManualClock) {}

  async record(campaign: Campaign): Promise<string> {
    this.recorded.push({ campaign, at: this.clock.now() })
    return `/tmp/${campaign.target}.csv`
  }
}

function context(): RunContext {
  const wallet = new Wallet(Wallet.createRandom().privateKey)
  return {
    signer: wallet,
    intent: { chainId: 8453n, from: wallet.address, to: '0x000000000000000000000000000000000000dEaD', value: 100n, gasLimit: 21000n }
  }
}

function target(endpoint: FakeEndpoint, overrides: Partial<CampaignTarget> = {}): CampaignTarget {
  return {
    name: endpoint.name,
    endpoint,
    mode: 'sync',
    count: 3,
    pollingIntervalMs: 50,
    nonceSource: 'pending',
    pacing: { minDelayMs: 200, jitterMs: 200 },
    ...overrides
  }
}

describe('pacingDelay', () => {
  it('adds floor(random * jitter) to the minimum', () => {
    expect(pacingDelay({ minDelayMs: 600, jitterMs: 600 }, () => 0)).toBe(600)
    expect(pacingDelay({ minDelayMs: 600, jitterMs: 600 }, () => 0.5)).toBe(900)
    expect(pacingDelay({ minDelayMs: 4000, jitterMs: 1000 }, () => 0.9999)).toBe(4999)
  })
})

describe('CampaignRunner', () => {
  it('end to end: fee cap 100, tip 2, nonce 5, block 42 after 50ms', async () => {
    const clock = new ManualClock()
    const ep = new FakeEndpoint('endpoint1')
    let sentRaw = ''
    ep.sendRawTransactionSync.mockImplementation(async (raw: string) => {
      sentRaw = raw
      clock.advance(50)
      return { transactionHash: Transaction.from(raw).hash ?? '', blockNumber: 42 }
    })

    const campaign = await new CampaignRunner(context(), { clock, random: () => 0 }).run(target(ep, { count: 1 }))

    const sent = Transaction.from(sentRaw)
    expect(sent.nonce).toBe(5)
    expect(sent.maxFeePerGas).toBe(100n)
    expect(sent.maxPriorityFeePerGas).toBe(2n)
    expect(campaign.errors).toBe(0)
    expect(campaign.results).toHaveLength(1)
    expect(campaign.results[0]).toMatchObject({ txHash: sent.hash, includedInBlock: 42, inclusionDelayMs: 50 })
  })

  it('produces exactly N records and counts zero-valued ones as errors', async () => {
    const clock = new ManualClock()
    const ep = new FakeEndpoint('endpoint1')
    // iteration 0: fee quote fails; 1: nonce read fails; 2: ok; 3: empty receipt; 4: ok
    ep.getGasPrice.mockRejectedValueOnce(new Error('rpc down'))
    ep.getNonce.mockResolvedValueOnce(0).mockRejectedValueOnce(new Error('timeout'))
    ep.sendRawTransactionSync
      .mockResolvedValueOnce({ transactionHash: '0x', blockNumber: 10 })
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce({ transactionHash: '0x', blockNumber: 12 })

    const campaign = await new CampaignRunner(context(), { clock, random: () => 0 }).run(target(ep, { count: 5 }))

    expect(campaign.results).toHaveLength(5)
    expect(campaign.errors).toBe(3)
    expect(campaign.results.filter(isEmptyResult)).toHaveLength(campaign.errors)
    expect(campaign.results.map((r) => r.includedInBlock)).toEqual([0, 0, 10, 0, 12])
    for (const r of campaign.results.filter((x) => !isEmptyResult(x))) {
      expect(r.includedInBlock).toBeGreaterThan(0)
      expect(r.inclusionDelayMs).toBeGreaterThanOrEqual(0)
    }
  })

  it('never aborts early and paces between iterations only', async () => {
    const clock = new ManualClock()
    const ep = new FakeEndpoint('endpoint1')
    ep.sendRawTransactionSync.mockRejectedValue(new Error('always fails'))

    const campaign = await new CampaignRunner(context(), { clock, random: () => 0.5 }).run(target(ep, { count: 4 }))

    expect(campaign.errors).toBe(4)
    expect(campaign.results).toHaveLength(4)
    expect(campaign.results.every(isEmptyResult)).toBe(true)
    expect(ep.sendRawTransactionSync).toHaveBeenCalledTimes(4)
    expect(clock.sleeps).toEqual([300, 300, 300])
  })

  it('handles an empty campaign', async () => {
    const ep = new FakeEndpoint('endpoint1')
    const campaign = await new CampaignRunner(context(), { clock: new ManualClock() }).run(target(ep, { count: 0 }))
    expect(campaign).toEqual({ target: 'endpoint1', mode: 'sync', results: [], errors: 0 })
    expect(ep.getNonce).not.toHaveBeenCalled()
  })

  it('async mode goes through the polling path with the target interval', async () => {
    const clock = new ManualClock()
    const ep = new FakeEndpoint('endpoint2')
    ep.getTransactionReceipt.mockResolvedValueOnce(null).mockResolvedValueOnce({ transactionHash: '0x', blockNumber: 99 })

    const campaign = await new CampaignRunner(context(), { clock }).run(target(ep, { mode: 'async', count: 1, pollingIntervalMs: 40 }))

    expect(campaign.results[0]).toMatchObject({ includedInBlock: 99, inclusionDelayMs: 40 })
    expect(ep.sendRawTransactionSync).not.toHaveBeenCalled()
    expect(clock.sleeps).toEqual([40])
  })

  it('runs targets in order, records each, and settles between them', async () => {
    const clock = new ManualClock()
    const sink = new MemorySink(clock)
    const first = new FakeEndpoint('endpoint1')
    const second = new FakeEndpoint('endpoint2')
    const order: string[] = []
    first.sendRawTransactionSync.mockImplementation(async () => {
      order.push('endpoint1')
      return { transactionHash: '0x', blockNumber: 1 }
    })
    second.sendRawTransactionSync.mockImplementation(async () => {
      order.push('endpoint2')
      return { transactionHash: '0x', blockNumber: 2 }
    })
    const dispatcher = new Dispatcher(clock)

    const campaigns = await new CampaignRunner(context(), { clock, dispatcher, random: () => 0 }).runAll(
      [target(first, { count: 2 }), target(second, { count: 2, pacing: { minDelayMs: 4000, jitterMs: 1000 } })],
      sink,
      5000
    )

    expect(order).toEqual(['endpoint1', 'endpoint1', 'endpoint2', 'endpoint2'])
    expect(campaigns.map((c) => c.target)).toEqual(['endpoint1', 'endpoint2'])
    expect(sink.recorded.map((r) => r.campaign.target)).toEqual(['endpoint1', 'endpoint2'])
    // pacing 200, settle 5000, pacing 4000; nothing after the last target
    expect(clock.sleeps).toEqual([200, 5000, 4000])
    expect(sink.recorded[1].at - sink.recorded[0].at).toBe(9000)
  })
})
