import { JsonRpcProvider, Network } from 'ethers'
import { z } from 'zod'
import type { NonceSource } from '../types'

export interface ReceiptSummary {
  transactionHash: string
  blockNumber: number
}

/**
 * One long-lived RPC endpoint handle. Every remote call the benchmark makes
 * goes through this interface so campaigns and tests can swap transports.
 */
export interface RpcEndpoint {
  readonly name: string
  getChainId(): Promise<bigint>
  getGasPrice(): Promise<bigint>
  getMaxPriorityFeePerGas(): Promise<bigint>
  getNonce(address: string, source: NonceSource): Promise<number>
  getBlockNumber(): Promise<number>
  /** Broadcast only; resolves with the node-reported tx hash. */
  sendRawTransaction(raw: string): Promise<string>
  /** Blocks until the node has a receipt (flashblocks-aware nodes). */
  sendRawTransactionSync(raw: string): Promise<ReceiptSummary | null>
  getTransactionReceipt(hash: string): Promise<ReceiptSummary | null>
}

/** The slice of an ethers provider this module calls. */
export type RpcTransport = Pick<JsonRpcProvider, 'send'>

const Quantity = z.string().regex(/^0x[0-9a-fA-F]+$/, 'expected hex quantity').transform((v) => BigInt(v))

const ReceiptSchema = z.object({
  transactionHash: z.string(),
  blockNumber: Quantity
})

function parseReceipt(raw: unknown): ReceiptSummary | null {
  if (raw === null || raw === undefined) return null
  const r = ReceiptSchema.parse(raw)
  return {
    transactionHash: r.transactionHash,
    blockNumber: Number(r.blockNumber)
  }
}

export class JsonRpcEndpoint implements RpcEndpoint {
  constructor(
    public readonly name: string,
    private readonly transport: RpcTransport
  ) {}

  /**
   * Build a provider-backed endpoint. Batching is off so each call is a single
   * request on the wire, and the network is pinned after the first detection.
   */
  static connect(name: string, url: string, chainId?: bigint): { endpoint: JsonRpcEndpoint; provider: JsonRpcProvider } {
    const network = chainId === undefined ? undefined : Network.from(chainId)
    const provider = new JsonRpcProvider(url, network, { batchMaxCount: 1, staticNetwork: network ?? true })
    return { endpoint: new JsonRpcEndpoint(name, provider), provider }
  }

  private async quantity(method: string, params: unknown[] = []): Promise<bigint> {
    const res: unknown = await this.transport.send(method, params)
    return Quantity.parse(res)
  }

  getChainId(): Promise<bigint> {
    return this.quantity('eth_chainId')
  }

  getGasPrice(): Promise<bigint> {
    return this.quantity('eth_gasPrice')
  }

  getMaxPriorityFeePerGas(): Promise<bigint> {
    return this.quantity('eth_maxPriorityFeePerGas')
  }

  async getNonce(address: string, source: NonceSource): Promise<number> {
    return Number(await this.quantity('eth_getTransactionCount', [address, source]))
  }

  async getBlockNumber(): Promise<number> {
    return Number(await this.quantity('eth_blockNumber'))
  }

  async sendRawTransaction(raw: string): Promise<string> {
    const res: unknown = await this.transport.send('eth_sendRawTransaction', [raw])
    return z.string().parse(res)
  }

  async sendRawTransactionSync(raw: string): Promise<ReceiptSummary | null> {
    return parseReceipt(await this.transport.send('eth_sendRawTransactionSync', [raw]))
  }

  async getTransactionReceipt(hash: string): Promise<ReceiptSummary | null> {
    return parseReceipt(await this.transport.send('eth_getTransactionReceipt', [hash]))
  }
}

export default JsonRpcEndpoint
