import pino from 'pino'
import type { SubmissionMode } from '../types'

type TransitionPayload = {
  txHash: string
  endpoint: string
  from: string
  to: string
  attempt?: number
  ts?: string
}

type DispatchPayload = {
  endpoint: string
  mode: SubmissionMode
  iteration: number
  txHash?: string
  block?: number
  delay_ms?: number
  error?: string
}

type CampaignPayload = {
  endpoint: string
  mode: SubmissionMode
  count: number
  errors: number
}

type BundlePayload = {
  endpoint: string
  target_block: number
  txs: number
  bundle_id?: string
  error?: string
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export function isLogLevel(v: string | undefined): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v)
}

export function createLogger(level: LogLevel): pino.Logger {
  return pino({ level })
}

// default logger until the run config is loaded; an unknown LOG_LEVEL falls back to info here
// and is reported by config validation
const envLevel = process.env.LOG_LEVEL
let logger: pino.BaseLogger = createLogger(isLogLevel(envLevel) ? envLevel : 'info')

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

export function logTransition(payload: TransitionPayload): void {
  const base = {
    event: 'dispatch.transition',
    txHash: payload.txHash,
    endpoint: payload.endpoint,
    from: payload.from,
    to: payload.to,
    attempt: payload.attempt,
    ts: payload.ts ?? new Date().toISOString()
  }

  if (payload.to === 'FAILED' || payload.to === 'EXHAUSTED') logger.warn(base)
  else logger.debug(base)
}

export function logDispatch(payload: DispatchPayload): void {
  const base = { event: 'dispatch.result', ...payload }
  if (payload.error !== undefined) logger.warn(base)
  else logger.info(base)
}

export function logCampaign(payload: CampaignPayload): void {
  logger.info({ event: 'campaign.complete', ...payload })
}

export function logBundle(payload: BundlePayload): void {
  const base = { event: 'bundle.submit', ...payload }
  if (payload.error !== undefined) logger.warn(base)
  else logger.info(base)
}

export function logError(message: string, error: string): void {
  logger.error({ event: 'error', message, error })
}
