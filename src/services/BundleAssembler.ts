import { BlockHeightError, BundleSubmissionError, describeError } from '../errors'
import { logBundle } from '../utils/logger'
import { buildAndSignTransfer, quoteFees, readNonce } from './TxBuilder'
import type { BundleSubmitter } from './BundleClient'
import type { RpcEndpoint } from './RpcEndpoint'
import type { BundleDescriptor, RunContext, SignedTransfer } from '../types'

export interface BundleWindow {
  minFlashblockNumber?: number
  maxFlashblockNumber?: number
  minTimestamp?: number
  maxTimestamp?: number
}

export interface BundleOptions extends BundleWindow {
  droppingTxHashes?: string[]
  replacementUuid?: string
}

export interface AssembledBundle {
  descriptor: BundleDescriptor
  transfers: SignedTransfer[]
}

export interface SubmittedBundle extends AssembledBundle {
  bundleId: string
}

/**
 * BundleAssembler
 * Builds numTxs transfers on pre-allocated sequential nonces and wraps them in
 * one atomic descriptor for the block after the current head.
 *
 * Two behaviours are kept deliberately simple and are open questions:
 *  - every transaction hash is listed as allowed to revert
 *  - the next block is targeted once; a missed block is not retried
 */
export class BundleAssembler {
  constructor(private readonly endpoint: RpcEndpoint, private readonly submitter: BundleSubmitter) {}

  async assemble(ctx: RunContext, numTxs: number, opts: BundleOptions = {}): Promise<AssembledBundle> {
    if (!Number.isInteger(numTxs) || numTxs < 1) {
      throw new RangeError(`bundle needs at least one transaction, got ${numTxs}`)
    }

    let head: number
    try {
      head = await this.endpoint.getBlockNumber()
    } catch (e) {
      throw new BlockHeightError(`unable to read block height from ${this.endpoint.name}`, { cause: e })
    }
    const targetBlock = head + 1

    const firstNonce = await readNonce(this.endpoint, ctx.intent.from, 'latest')

    // nothing leaves this loop unless every transfer signs
    const transfers: SignedTransfer[] = []
    for (let i = 0; i < numTxs; i++) {
      const fees = await quoteFees(this.endpoint)
      transfers.push(await buildAndSignTransfer(ctx.signer, ctx.intent, firstNonce + i, fees))
    }

    const descriptor: BundleDescriptor = {
      txs: transfers.map((t) => t.raw),
      blockNumber: targetBlock,
      minFlashblockNumber: opts.minFlashblockNumber,
      maxFlashblockNumber: opts.maxFlashblockNumber,
      minTimestamp: opts.minTimestamp,
      maxTimestamp: opts.maxTimestamp,
      revertingTxHashes: transfers.map((t) => t.hash),
      droppingTxHashes: [...(opts.droppingTxHashes ?? [])],
      replacementUuid: opts.replacementUuid
    }
    return { descriptor, transfers }
  }

  async submit(ctx: RunContext, numTxs: number, opts: BundleOptions = {}): Promise<SubmittedBundle> {
    const assembled = await this.assemble(ctx, numTxs, opts)
    const { descriptor } = assembled
    try {
      const bundleId = await this.submitter.sendBundle(descriptor)
      logBundle({ endpoint: this.submitter.url, target_block: descriptor.blockNumber, txs: descriptor.txs.length, bundle_id: bundleId })
      return { ...assembled, bundleId }
    } catch (e) {
      const err = e instanceof BundleSubmissionError ? e : new BundleSubmissionError('bundle submission failed', { cause: e })
      logBundle({ endpoint: this.submitter.url, target_block: descriptor.blockNumber, txs: descriptor.txs.length, error: describeError(err) })
      throw err
    }
  }
}

export default BundleAssembler
