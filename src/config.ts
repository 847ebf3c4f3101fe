// src/config.ts

/**
 * Run configuration: environment variables (optionally from .env) validated
 * into one typed object. Nothing here reaches the network.
 */
import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'
import { isAddress, ZeroAddress, getAddress } from 'ethers'
import { z } from 'zod'
import { ConfigurationError } from './errors'
import { LOG_LEVELS, type LogLevel } from './utils/logger'
import type { PacingPolicy, SubmissionMode } from './types'

export const DEFAULTS = {
  POLLING_INTERVAL_MS: 50,
  NUMBER_OF_TRANSACTIONS: 100,
  OUTPUT_DIR: '/data',
  BUNDLE_TX_COUNT: 3,
  SETTLE_DELAY_MS: 5000
}

// Pacing between transactions, tuned to each endpoint's confirmation cadence
export const PACING = {
  FAST_SYNC: { minDelayMs: 200, jitterMs: 200 },
  FAST_ASYNC: { minDelayMs: 600, jitterMs: 600 },
  STANDARD: { minDelayMs: 4000, jitterMs: 1000 }
} satisfies Record<string, PacingPolicy>

/** Load .env from the package root, falling back to cwd. First match wins. */
export function loadEnvFile(): string | undefined {
  const candidates = [path.resolve(__dirname, '..', '.env'), path.join(process.cwd(), '.env')]
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p })
      return p
    }
  }
  return undefined
}

// unparsable numbers ("50ms", "1e3", "") fall back to the default instead of failing the run
function intOr(fallback: number) {
  return z
    .string()
    .optional()
    .transform((v) => {
      const t = v?.trim()
      return t !== undefined && /^[+-]?\d+$/.test(t) ? Number(t) : fallback
    })
}

// an empty variable counts as unset
const blankAsUnset = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v)

const required = (name: string) => z.string({ required_error: `${name} environment variable not set` }).trim().min(1, `${name} environment variable not set`)

const httpUrl = (name: string) => required(name).url(`${name} must be a URL`)

const EnvSchema = z.object({
  REGION: required('REGION'),
  PRIVATE_KEY: required('PRIVATE_KEY').regex(/^(0x)?[0-9a-fA-F]{64}$/, 'PRIVATE_KEY must be 32 bytes of hex'),
  TO_ADDRESS: required('TO_ADDRESS').transform((v, ctx) => {
    if (!isAddress(v)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'TO_ADDRESS must be an address' })
      return z.NEVER
    }
    const address = getAddress(v)
    if (address === ZeroAddress) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'TO_ADDRESS must not be the zero address' })
      return z.NEVER
    }
    return address
  }),
  BASE_NODE_ENDPOINT_1: httpUrl('BASE_NODE_ENDPOINT_1'),
  BASE_NODE_ENDPOINT_2: httpUrl('BASE_NODE_ENDPOINT_2'),
  SEND_TXN_SYNC: z.string().optional().transform((v) => v === 'true'),
  RUN_ENDPOINT2_TESTING: z.string().optional().transform((v) => v !== 'false'),
  POLLING_INTERVAL_MS: intOr(DEFAULTS.POLLING_INTERVAL_MS).pipe(z.number().int().min(0, 'POLLING_INTERVAL_MS must be >= 0')),
  NUMBER_OF_TRANSACTIONS: intOr(DEFAULTS.NUMBER_OF_TRANSACTIONS).pipe(z.number().int().min(0, 'NUMBER_OF_TRANSACTIONS must be >= 0')),
  OUTPUT_DIR: z.string().optional().transform((v) => (v && v.trim() ? v.trim() : DEFAULTS.OUTPUT_DIR)),
  RUN_BUNDLE_TEST: z.string().optional().transform((v) => v === 'true'),
  BUNDLE_TX_COUNT: intOr(DEFAULTS.BUNDLE_TX_COUNT).pipe(z.number().int().min(1, 'BUNDLE_TX_COUNT must be >= 1')),
  BUNDLE_RPC_URL: z.preprocess(blankAsUnset, z.string().url('BUNDLE_RPC_URL must be a URL').optional()),
  LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z.enum(LOG_LEVELS, { errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }) }).default('info')
  )
})

export interface EndpointConfig {
  name: string
  url: string
  pacing: PacingPolicy
}

export interface BenchConfig {
  region: string
  privateKey: string
  toAddress: string
  mode: SubmissionMode
  pollingIntervalMs: number
  numberOfTransactions: number
  outputDir: string
  settleDelayMs: number
  logLevel: LogLevel
  /** Run order; the second endpoint is absent when RUN_ENDPOINT2_TESTING=false. */
  endpoints: EndpointConfig[]
  bundle: { enabled: boolean; txCount: number; url: string }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BenchConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => i.message)
    throw new ConfigurationError(issues.join('; '), {
      context: { variables: parsed.error.issues.map((i) => i.path.join('.')).join(',') }
    })
  }
  const e = parsed.data
  const mode: SubmissionMode = e.SEND_TXN_SYNC ? 'sync' : 'async'

  const endpoints: EndpointConfig[] = [
    { name: 'endpoint1', url: e.BASE_NODE_ENDPOINT_1, pacing: mode === 'sync' ? PACING.FAST_SYNC : PACING.FAST_ASYNC }
  ]
  if (e.RUN_ENDPOINT2_TESTING) {
    endpoints.push({ name: 'endpoint2', url: e.BASE_NODE_ENDPOINT_2, pacing: PACING.STANDARD })
  }

  return {
    region: e.REGION,
    privateKey: e.PRIVATE_KEY,
    toAddress: e.TO_ADDRESS,
    mode,
    pollingIntervalMs: e.POLLING_INTERVAL_MS,
    numberOfTransactions: e.NUMBER_OF_TRANSACTIONS,
    outputDir: e.OUTPUT_DIR,
    settleDelayMs: DEFAULTS.SETTLE_DELAY_MS,
    logLevel: e.LOG_LEVEL,
    endpoints,
    bundle: {
      enabled: e.RUN_BUNDLE_TEST,
      txCount: e.BUNDLE_TX_COUNT,
      url: e.BUNDLE_RPC_URL ?? e.BASE_NODE_ENDPOINT_1
    }
  }
}
