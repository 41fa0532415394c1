import { once } from 'node:events'
import { createInterface } from 'node:readline'
import { finished } from 'node:stream/promises'
import { setTimeout as delay } from 'node:timers/promises'
import type { Readable, Writable } from 'node:stream'
import type { Logger } from './logger'

/**
 * Iterates the lines of a stream until it ends. Terminators (\n or \r\n) are stripped.
 */
export const readLines = (input: Readable): AsyncIterable<string> => {
  return createInterface({ input, crlfDelay: Infinity })
}

export interface WriteRecordsOptions {
  /** Wait after each record; 0 disables pacing. */
  delayMs: number
  log: Logger
  /** Prefix of the progress line logged after each record, e.g. "Generated". */
  label: string
  signal?: AbortSignal
}

/**
 * Writes each record as a newline-terminated line, logs progress once the
 * stream has accepted the line, then waits the configured delay. Ends the
 * output after the last record and resolves once it has finished.
 * @throws The stream's error if it fails or closes early; an AbortError when the signal aborts.
 */
export const writeRecords = async (
  output: Writable,
  records: readonly string[],
  options: WriteRecordsOptions
): Promise<void> => {
  const { delayMs, log, label, signal } = options
  const closed = finished(output, { readable: false })
  const untilClosed = <T>(task: Promise<T>) => Promise.race([task, closed])

  const writeAll = async (): Promise<void> => {
    for (const record of records) {
      signal?.throwIfAborted()
      if (!output.write(`${record}\n`)) {
        await untilClosed(once(output, 'drain', { signal }))
      }
      log.info(`${label}: ${record}`)
      if (delayMs > 0) {
        await untilClosed(delay(delayMs, undefined, { signal }))
      }
    }
    output.end()
  }

  await Promise.all([writeAll(), closed])
}
