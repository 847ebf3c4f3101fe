/**
 * Shared data model.
 */
import type { TransactionRequest } from 'ethers'

export type SubmissionMode = 'sync' | 'async'

/** `pending` counts mempool-visible txs, `latest` only confirmed ones. */
export type NonceSource = 'pending' | 'latest'

export interface TransferIntent {
  chainId: bigint
  from: string
  to: string
  value: bigint
  gasLimit: bigint
}

export interface SignedTransfer {
  raw: string // 0x-prefixed type-2 encoding
  hash: string
  nonce: number
}

export interface FeeQuote {
  maxFeePerGas: bigint
  maxPriorityFeePerGas: bigint
}

export interface DispatchResult {
  sentAt: Date
  txHash: string
  includedInBlock: number
  inclusionDelayMs: number
}

export interface BundleDescriptor {
  txs: string[]
  blockNumber: number
  minFlashblockNumber?: number
  maxFlashblockNumber?: number
  minTimestamp?: number
  maxTimestamp?: number
  revertingTxHashes: string[]
  droppingTxHashes: string[]
  replacementUuid?: string
}

export interface PacingPolicy {
  minDelayMs: number
  jitterMs: number
}

export interface Campaign {
  target: string
  mode: SubmissionMode
  results: DispatchResult[]
  errors: number
}

/** Sign-only view of an ethers Wallet. */
export interface TransferSigner {
  readonly address: string
  signTransaction(tx: TransactionRequest): Promise<string>
}

export interface RunContext {
  signer: TransferSigner
  intent: TransferIntent
}

export const TRANSFER_VALUE_WEI = 100n
export const TRANSFER_GAS_LIMIT = 21_000n

export function emptyResult(): DispatchResult {
  return { sentAt: new Date(0), txHash: '', includedInBlock: 0, inclusionDelayMs: 0 }
}

export function isEmptyResult(r: DispatchResult): boolean {
  return r.txHash === '' && r.includedInBlock === 0
}
