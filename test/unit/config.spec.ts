import { loadConfig, PACING } from '../../src/config'
import { ConfigurationError } from '../../src/errors'

const BASE_ENV = {
  REGION: 'us-east',
  PRIVATE_KEY: '0x' + '11'.repeat(32),
  TO_ADDRESS: '0x000000000000000000000000000000000000dead',
  BASE_NODE_ENDPOINT_1: 'https://fast.example',
  BASE_NODE_ENDPOINT_2: 'https://standard.example'
}

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    const cfg = loadConfig({ ...BASE_ENV })
    expect(cfg.mode).toBe('async')
    expect(cfg.pollingIntervalMs).toBe(50)
    expect(cfg.numberOfTransactions).toBe(100)
    expect(cfg.outputDir).toBe('/data')
    expect(cfg.settleDelayMs).toBe(5000)
    expect(cfg.logLevel).toBe('info')
    expect(cfg.toAddress).toBe('0x000000000000000000000000000000000000dEaD')
    expect(cfg.endpoints).toEqual([
      { name: 'endpoint1', url: 'https://fast.example', pacing: PACING.FAST_ASYNC },
      { name: 'endpoint2', url: 'https://standard.example', pacing: PACING.STANDARD }
    ])
    expect(cfg.bundle).toEqual({ enabled: false, txCount: 3, url: 'https://fast.example' })
  })

  it('switches to sync mode with faster pacing on the first endpoint', () => {
    const cfg = loadConfig({ ...BASE_ENV, SEND_TXN_SYNC: 'true' })
    expect(cfg.mode).toBe('sync')
    expect(cfg.endpoints[0].pacing).toEqual({ minDelayMs: 200, jitterMs: 200 })
  })

  it('drops the second endpoint when RUN_ENDPOINT2_TESTING=false', () => {
    const cfg = loadConfig({ ...BASE_ENV, RUN_ENDPOINT2_TESTING: 'false' })
    expect(cfg.endpoints.map((e) => e.name)).toEqual(['endpoint1'])
  })

  it('falls back to defaults on unparsable numbers', () => {
    const cfg = loadConfig({ ...BASE_ENV, POLLING_INTERVAL_MS: 'fast', NUMBER_OF_TRANSACTIONS: 'many' })
    expect(cfg.pollingIntervalMs).toBe(50)
    expect(cfg.numberOfTransactions).toBe(100)
  })

  it('treats numbers with trailing text as unparsable', () => {
    const cfg = loadConfig({ ...BASE_ENV, POLLING_INTERVAL_MS: '20ms', NUMBER_OF_TRANSACTIONS: '1e3', BUNDLE_TX_COUNT: ' ' })
    expect(cfg.pollingIntervalMs).toBe(50)
    expect(cfg.numberOfTransactions).toBe(100)
    expect(cfg.bundle.txCount).toBe(3)
  })

  it('falls back to the first endpoint when BUNDLE_RPC_URL is empty', () => {
    const cfg = loadConfig({ ...BASE_ENV, BUNDLE_RPC_URL: '' })
    expect(cfg.bundle.url).toBe('https://fast.example')
  })

  it('reads LOG_LEVEL and rejects unknown levels', () => {
    expect(loadConfig({ ...BASE_ENV, LOG_LEVEL: 'debug' }).logLevel).toBe('debug')
    expect(loadConfig({ ...BASE_ENV, LOG_LEVEL: '' }).logLevel).toBe('info')
    expect(() => loadConfig({ ...BASE_ENV, LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL must be one of/)
  })

  it('reads explicit numbers and bundle settings', () => {
    const cfg = loadConfig({
      ...BASE_ENV,
      POLLING_INTERVAL_MS: '20',
      NUMBER_OF_TRANSACTIONS: '7',
      RUN_BUNDLE_TEST: 'true',
      BUNDLE_TX_COUNT: '5',
      BUNDLE_RPC_URL: 'https://builder.example'
    })
    expect(cfg.pollingIntervalMs).toBe(20)
    expect(cfg.numberOfTransactions).toBe(7)
    expect(cfg.bundle).toEqual({ enabled: true, txCount: 5, url: 'https://builder.example' })
  })

  it('throws ConfigurationError naming each missing variable', () => {
    const { REGION: _r, PRIVATE_KEY: _k, ...rest } = BASE_ENV
    expect(() => loadConfig(rest)).toThrow(ConfigurationError)
    expect(() => loadConfig(rest)).toThrow(/REGION environment variable not set/)
    expect(() => loadConfig(rest)).toThrow(/PRIVATE_KEY environment variable not set/)
  })

  it('rejects the zero address as recipient', () => {
    expect(() => loadConfig({ ...BASE_ENV, TO_ADDRESS: '0x0000000000000000000000000000000000000000' })).toThrow(
      'TO_ADDRESS must not be the zero address'
    )
  })

  it('rejects a malformed private key', () => {
    expect(() => loadConfig({ ...BASE_ENV, PRIVATE_KEY: '0x1234' })).toThrow(ConfigurationError)
  })
})
