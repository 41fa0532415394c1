import type { Writable } from 'node:stream'
import { writeRecords, type Logger } from '@stdio-pipeline/pipeline-common'

/**
 * Configuration for the standalone generator stage.
 */
export interface GeneratorOptions {
  records: readonly string[]
  /** Pause after each record; 0 writes them back to back. */
  delayMs: number
  output: Writable
  log: Logger
  signal?: AbortSignal
}

/**
 * Writes the records to the output one line at a time, then ends the output.
 * @returns A promise that resolves once the output has been flushed.
 */
export const runGenerator = async (options: GeneratorOptions): Promise<void> => {
  const { records, delayMs, output, log, signal } = options
  log.info('Generator started...')

  await writeRecords(output, records, { delayMs, log, label: 'Generated', signal })

  log.info('Generator finished.')
}
