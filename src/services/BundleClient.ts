import axios, { AxiosError, type AxiosInstance } from 'axios'
import { toQuantity } from 'ethers'
import { z } from 'zod'
import { BundleSubmissionError } from '../errors'
import type { BundleDescriptor } from '../types'

export interface BundleSubmitter {
  readonly url: string
  sendBundle(bundle: BundleDescriptor): Promise<string>
}

interface JsonRpcRequest {
  jsonrpc: '2.0'
  id: number
  method: string
  params: unknown[]
}

/** Wire shape of an eth_sendBundle param; optional windows are left out when unset. */
export interface BundlePayload {
  txs: string[]
  blockNumber: string
  minFlashblockNumber?: number
  maxFlashblockNumber?: number
  minTimestamp?: number
  maxTimestamp?: number
  revertingTxHashes: string[]
  droppingTxHashes: string[]
  replacementUuid?: string
}

const JsonRpcResponse = z.object({
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).optional()
})

// Builders answer with a bare id, { bundleHash } or { bundleUuid }
const BundleId = z.union([
  z.string().min(1),
  z.object({ bundleHash: z.string().min(1) }).transform((r) => r.bundleHash),
  z.object({ bundleUuid: z.string().min(1) }).transform((r) => r.bundleUuid)
])

export function toBundlePayload(bundle: BundleDescriptor): BundlePayload {
  const payload: BundlePayload = {
    txs: [...bundle.txs],
    blockNumber: toQuantity(bundle.blockNumber),
    revertingTxHashes: [...bundle.revertingTxHashes],
    droppingTxHashes: [...bundle.droppingTxHashes]
  }
  if (bundle.minFlashblockNumber !== undefined) payload.minFlashblockNumber = bundle.minFlashblockNumber
  if (bundle.maxFlashblockNumber !== undefined) payload.maxFlashblockNumber = bundle.maxFlashblockNumber
  if (bundle.minTimestamp !== undefined) payload.minTimestamp = bundle.minTimestamp
  if (bundle.maxTimestamp !== undefined) payload.maxTimestamp = bundle.maxTimestamp
  if (bundle.replacementUuid !== undefined) payload.replacementUuid = bundle.replacementUuid
  return payload
}

/**
 * Minimal eth_sendBundle client. Posts the JSON-RPC body as-is; the target
 * endpoint is the block builder in front of the fast node.
 */
export class BundleClient implements BundleSubmitter {
  public readonly url: string
  private http: AxiosInstance
  private idCounter = 1

  constructor(url: string, timeoutMs = 10_000) {
    this.url = url.replace(/\/$/, '')
    this.http = axios.create({ baseURL: this.url, timeout: timeoutMs })
  }

  async sendBundle(bundle: BundleDescriptor): Promise<string> {
    if (bundle.txs.length === 0) {
      throw new BundleSubmissionError('bundle has no transactions')
    }
    if (bundle.txs.some((tx) => !tx.startsWith('0x'))) {
      throw new BundleSubmissionError('bundle transactions must be 0x-prefixed raw signed txs')
    }

    const body: JsonRpcRequest = {
      jsonrpc: '2.0',
      id: this.idCounter++,
      method: 'eth_sendBundle',
      params: [toBundlePayload(bundle)]
    }

    let data: unknown
    try {
      const res = await this.http.post('', body, { headers: { 'Content-Type': 'application/json' } })
      data = res.data
    } catch (e) {
      if (e instanceof AxiosError && e.response) {
        throw new BundleSubmissionError(`bundle endpoint HTTP ${e.response.status}`, {
          cause: e,
          statusCode: e.response.status,
          context: { url: this.url }
        })
      }
      throw new BundleSubmissionError('bundle endpoint unreachable', { cause: e, context: { url: this.url } })
    }

    const parsed = JsonRpcResponse.safeParse(data)
    if (!parsed.success) {
      throw new BundleSubmissionError('malformed JSON-RPC response from bundle endpoint', { cause: parsed.error })
    }
    if (parsed.data.error) {
      throw new BundleSubmissionError(`bundle rejected: ${parsed.data.error.message}`, {
        context: { rpcCode: parsed.data.error.code ?? 0 }
      })
    }
    const id = BundleId.safeParse(parsed.data.result)
    if (!id.success) {
      throw new BundleSubmissionError('bundle endpoint returned no bundle id', { cause: id.error })
    }
    return id.data
  }
}

export default BundleClient
