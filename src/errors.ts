/**
 * Error taxonomy for the benchmark.
 * Every failure carries a stable `code` so log consumers can group them; the
 * underlying RPC or library error travels as `cause`.
 */

export type BenchErrorCode =
  | 'CONFIGURATION'
  | 'FEE_QUOTE'
  | 'NONCE'
  | 'SIGNING'
  | 'SYNC_SUBMISSION'
  | 'ASYNC_SUBMISSION'
  | 'RECEIPT_TIMEOUT'
  | 'BLOCK_HEIGHT'
  | 'BUNDLE_SUBMISSION'

export type ErrorContext = Record<string, string | number | boolean>

export class BenchError extends Error {
  public readonly code: BenchErrorCode
  public readonly context?: ErrorContext

  constructor(code: BenchErrorCode, message: string, opts: { cause?: unknown; context?: ErrorContext } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'BenchError'
    this.code = code
    this.context = opts.context
  }
}

/** Missing or invalid run input. Fatal: nothing is dispatched. */
export class ConfigurationError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('CONFIGURATION', message, opts)
    this.name = 'ConfigurationError'
  }
}

export class FeeQuoteError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('FEE_QUOTE', message, opts)
    this.name = 'FeeQuoteError'
  }
}

export class NonceError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('NONCE', message, opts)
    this.name = 'NonceError'
  }
}

export class SigningError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('SIGNING', message, opts)
    this.name = 'SigningError'
  }
}

/**
 * Submit-and-confirm call failed or returned no receipt.
 * The transaction may still have been accepted by the node.
 */
export class SyncSubmissionError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('SYNC_SUBMISSION', message, opts)
    this.name = 'SyncSubmissionError'
  }
}

export class AsyncSubmissionError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('ASYNC_SUBMISSION', message, opts)
    this.name = 'AsyncSubmissionError'
  }
}

export class ReceiptTimeoutError extends BenchError {
  public readonly attempts: number

  constructor(txHash: string, attempts: number) {
    super('RECEIPT_TIMEOUT', `no receipt for ${txHash} after ${attempts} attempts`, { context: { txHash, attempts } })
    this.name = 'ReceiptTimeoutError'
    this.attempts = attempts
  }
}

export class BlockHeightError extends BenchError {
  constructor(message: string, opts?: { cause?: unknown; context?: ErrorContext }) {
    super('BLOCK_HEIGHT', message, opts)
    this.name = 'BlockHeightError'
  }
}

export class BundleSubmissionError extends BenchError {
  public readonly statusCode?: number

  constructor(message: string, opts: { cause?: unknown; context?: ErrorContext; statusCode?: number } = {}) {
    super('BUNDLE_SUBMISSION', message, opts)
    this.name = 'BundleSubmissionError'
    this.statusCode = opts.statusCode
  }
}

export function describeError(err: unknown): string {
  if (err instanceof BenchError) {
    const cause = err.cause === undefined ? '' : `: ${describeError(err.cause)}`
    return `${err.name}(${err.code}) ${err.message}${cause}`
  }
  if (err instanceof Error) return err.message
  return String(err)
}
