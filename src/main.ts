/*
 * Entry point for the inclusion latency benchmark.
 *
 * Responsibilities:
 *  1. Load and validate configuration (fatal on error, before any dispatch)
 *  2. Open one provider per endpoint and discover the chain id
 *  3. Optionally submit one bundle against the fast endpoint
 *  4. Run the campaign targets in order, one CSV per target
 *  5. Report per-target error counts and close providers
 */
import { loadConfig, loadEnvFile, type BenchConfig } from './config'
import { describeError } from './errors'
import { BundleAssembler } from './services/BundleAssembler'
import { BundleClient, type BundleSubmitter } from './services/BundleClient'
import { CampaignRunner, type CampaignTarget } from './services/CampaignRunner'
import { JsonRpcEndpoint, type RpcEndpoint } from './services/RpcEndpoint'
import { CsvStatsRecorder, type StatsSink } from './services/StatsRecorder'
import { loadSigner } from './services/TxBuilder'
import { systemClock, type Clock } from './utils/clock'
import { createLogger, getLogger, logError, setLogger } from './utils/logger'
import { TRANSFER_GAS_LIMIT, TRANSFER_VALUE_WEI, type Campaign, type RunContext } from './types'

/** An open endpoint and the means to release its connection. */
export interface EndpointHandle {
  endpoint: RpcEndpoint
  close(): void
}

export interface RunDeps {
  clock?: Clock
  random?: () => number
  /** chainId is set for every endpoint after the first */
  connect?: (name: string, url: string, chainId?: bigint) => EndpointHandle
  bundleSubmitter?: (url: string) => BundleSubmitter
  sink?: StatsSink
}

function connectJsonRpc(name: string, url: string, chainId?: bigint): EndpointHandle {
  const { endpoint, provider } = JsonRpcEndpoint.connect(name, url, chainId)
  return { endpoint, close: () => provider.destroy() }
}

export async function run(config: BenchConfig, deps: RunDeps = {}): Promise<Campaign[]> {
  const clock = deps.clock ?? systemClock
  const connect = deps.connect ?? connectJsonRpc
  const log = getLogger()
  const signer = loadSigner(config.privateKey)
  log.info({ event: 'run.start', from: signer.address, to: config.toAddress, mode: config.mode, count: config.numberOfTransactions, polling_interval_ms: config.pollingIntervalMs })

  if (config.endpoints.length === 1) {
    log.info({ event: 'run.skip', endpoint: 'endpoint2', reason: 'RUN_ENDPOINT2_TESTING=false' })
  }

  const handles: EndpointHandle[] = []
  try {
    const first = connect(config.endpoints[0].name, config.endpoints[0].url)
    handles.push(first)
    const chainId = await first.endpoint.getChainId()

    for (const ep of config.endpoints.slice(1)) {
      handles.push(connect(ep.name, ep.url, chainId))
    }

    const ctx: RunContext = {
      signer,
      intent: { chainId, from: signer.address, to: config.toAddress, value: TRANSFER_VALUE_WEI, gasLimit: TRANSFER_GAS_LIMIT }
    }

    if (config.bundle.enabled) {
      const submitter = deps.bundleSubmitter ? deps.bundleSubmitter(config.bundle.url) : new BundleClient(config.bundle.url)
      const assembler = new BundleAssembler(first.endpoint, submitter)
      try {
        await assembler.submit(ctx, config.bundle.txCount)
      } catch (e) {
        logError('bundle attempt failed', describeError(e))
      }
      await clock.sleep(config.settleDelayMs)
    }

    const targets: CampaignTarget[] = config.endpoints.map((ep, i) => ({
      name: ep.name,
      endpoint: handles[i].endpoint,
      mode: config.mode,
      count: config.numberOfTransactions,
      pollingIntervalMs: config.pollingIntervalMs,
      nonceSource: 'pending',
      pacing: ep.pacing
    }))

    const runner = new CampaignRunner(ctx, { clock, random: deps.random })
    const sink = deps.sink ?? new CsvStatsRecorder(config.outputDir, config.region)
    const campaigns = await runner.runAll(targets, sink, config.settleDelayMs)

    log.info({ event: 'run.complete', transactions: config.numberOfTransactions })
    for (const c of campaigns) {
      log.info({ event: 'run.errors', endpoint: c.target, errors: c.errors })
    }
    return campaigns
  } finally {
    for (const h of handles) h.close()
  }
}

async function main(): Promise<void> {
  loadEnvFile()
  const config = loadConfig()
  setLogger(createLogger(config.logLevel))
  await run(config)
}

if (require.main === module) {
  main().catch((e) => {
    logError('run aborted', describeError(e))
    process.exitCode = 1
  })
}
