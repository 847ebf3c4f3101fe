import { Transaction, type TransactionRequest, Wallet } from 'ethers'
import { FeeQuoteError, NonceError, SigningError, describeError } from '../errors'
import type { RpcEndpoint } from './RpcEndpoint'
import type { FeeQuote, NonceSource, RunContext, SignedTransfer, TransferIntent, TransferSigner } from '../types'

/** Derive the signing wallet; a malformed key surfaces as SigningError. */
export function loadSigner(privateKey: string): Wallet {
  const pk = privateKey.startsWith('0x') ? privateKey : '0x' + privateKey
  try {
    return new Wallet(pk)
  } catch (e) {
    throw new SigningError('private key cannot produce a signer', { cause: e })
  }
}

/**
 * Fee quote straight from the endpoint: the suggested gas price is the cap,
 * the suggested priority fee the tip. No markup.
 */
export async function quoteFees(endpoint: RpcEndpoint): Promise<FeeQuote> {
  let maxFeePerGas: bigint
  let maxPriorityFeePerGas: bigint
  try {
    maxFeePerGas = await endpoint.getGasPrice()
  } catch (e) {
    throw new FeeQuoteError(`unable to get gas price from ${endpoint.name}`, { cause: e })
  }
  try {
    maxPriorityFeePerGas = await endpoint.getMaxPriorityFeePerGas()
  } catch (e) {
    throw new FeeQuoteError(`unable to get priority fee from ${endpoint.name}`, { cause: e })
  }
  return { maxFeePerGas, maxPriorityFeePerGas }
}

export async function readNonce(endpoint: RpcEndpoint, address: string, source: NonceSource): Promise<number> {
  try {
    return await endpoint.getNonce(address, source)
  } catch (e) {
    throw new NonceError(`unable to get ${source} nonce for ${address} from ${endpoint.name}`, { cause: e })
  }
}

export async function buildAndSignTransfer(
  signer: TransferSigner,
  intent: TransferIntent,
  nonce: number,
  fees: FeeQuote
): Promise<SignedTransfer> {
  const tx: TransactionRequest = {
    type: 2,
    chainId: intent.chainId,
    to: intent.to,
    nonce,
    gasLimit: intent.gasLimit,
    maxFeePerGas: fees.maxFeePerGas,
    maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
    value: intent.value,
    data: '0x'
  }
  let raw: string
  try {
    raw = await signer.signTransaction(tx)
  } catch (e) {
    throw new SigningError(`unable to sign transaction with nonce ${nonce}: ${describeError(e)}`, { cause: e })
  }
  // hash comes from the signed encoding
  const parsed = Transaction.from(raw)
  if (parsed.type !== 2 || parsed.hash === null) {
    throw new SigningError('signer did not produce a signed type-2 transaction')
  }
  return { raw, hash: parsed.hash, nonce }
}

/** Nonce read, fee quote and signature for one campaign iteration. */
export async function prepareTransfer(ctx: RunContext, endpoint: RpcEndpoint, source: NonceSource): Promise<SignedTransfer> {
  const nonce = await readNonce(endpoint, ctx.intent.from, source)
  const fees = await quoteFees(endpoint)
  return buildAndSignTransfer(ctx.signer, ctx.intent, nonce, fees)
}
