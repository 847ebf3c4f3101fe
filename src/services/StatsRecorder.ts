import { promises as fs } from 'node:fs'
import path from 'node:path'
import type { Campaign, DispatchResult } from '../types'

export const CSV_HEADER = ['sent_at', 'txn_hash', 'included_in_block', 'inclusion_delay_ms'] as const

/** Consumer of finished campaigns. */
export interface StatsSink {
  record(campaign: Campaign): Promise<string>
}

export function toCsvRow(r: DispatchResult): string {
  return [r.sentAt.toISOString(), r.txHash, String(r.includedInBlock), String(Math.trunc(r.inclusionDelayMs))].join(',')
}

export function toCsv(results: DispatchResult[]): string {
  return [CSV_HEADER.join(','), ...results.map(toCsvRow)].join('\n') + '\n'
}

export function parseCsv(content: string): DispatchResult[] {
  const lines = content.split(/\r?\n/).filter((l) => l.length > 0)
  if (lines.length === 0 || lines[0] !== CSV_HEADER.join(',')) {
    throw new Error('stats file does not start with the expected header')
  }
  return lines.slice(1).map((line, i) => {
    const cols = line.split(',')
    if (cols.length !== CSV_HEADER.length) {
      throw new Error(`row ${i + 1}: expected ${CSV_HEADER.length} columns, got ${cols.length}`)
    }
    const [sentAt, txHash, block, delay] = cols
    return {
      sentAt: new Date(sentAt),
      txHash,
      includedInBlock: Number.parseInt(block, 10),
      inclusionDelayMs: Number.parseInt(delay, 10)
    }
  })
}

/**
 * Writes one CSV per campaign: <dir>/<target>-<region>.csv
 * Zero-valued rows from failed iterations are written like any other row.
 */
export class CsvStatsRecorder implements StatsSink {
  constructor(private readonly dir: string, private readonly region: string) {}

  fileFor(target: string): string {
    return path.join(this.dir, `${target}-${this.region}.csv`)
  }

  async record(campaign: Campaign): Promise<string> {
    const file = this.fileFor(campaign.target)
    await fs.mkdir(this.dir, { recursive: true })
    await fs.writeFile(file, toCsv(campaign.results), 'utf8')
    return file
  }

  async read(target: string): Promise<DispatchResult[]> {
    return parseCsv(await fs.readFile(this.fileFor(target), 'utf8'))
  }
}

export default CsvStatsRecorder
