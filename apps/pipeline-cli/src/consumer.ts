import type { Readable } from 'node:stream'
import {
  parseInteger,
  readLines,
  RecordFormatError,
  splitFields,
  TotalRangeError,
  type Logger,
  type PipelineRecord,
} from '@stdio-pipeline/pipeline-common'

export interface Aggregator {
  /** Returns the accepted record, or null when the line was discarded. */
  add: (line: string) => PipelineRecord | null
  records: () => PipelineRecord[]
  total: () => number
}

export interface ConsumerSummary {
  records: PipelineRecord[]
  total: number
}

/**
 * Creates an in-memory running total over record lines.
 * Lines with fewer than three fields are discarded without notice.
 * @throws RecordFormatError from `add` when a quantity is not an integer.
 * @throws TotalRangeError from `add` when the total would leave the safe integer range.
 */
export const createAggregator = (): Aggregator => {
  const accepted: PipelineRecord[] = []
  let total = 0

  const add = (line: string): PipelineRecord | null => {
    const fields = splitFields(line)
    if (!fields) {
      return null
    }

    const [name, quantityText, attribute] = fields
    const quantity = parseInteger(quantityText)
    if (quantity === null) {
      throw new RecordFormatError(line)
    }

    const next = total + quantity
    if (!Number.isSafeInteger(next)) {
      throw new TotalRangeError(line)
    }

    const record: PipelineRecord = { name, quantity, attribute }
    accepted.push(record)
    total = next
    return record
  }

  return { add, records: () => [...accepted], total: () => total }
}

export const formatResult = (record: PipelineRecord): string => {
  return `Fruit: ${record.name}, Count: ${record.quantity}, Color: ${record.attribute}`
}

export interface ConsumerStreams {
  input: Readable
  /** Receives results and notices alike. */
  log: Logger
}

/**
 * Reads records until the input ends, printing each accepted record and the final total.
 */
export const runConsumer = async ({ input, log }: ConsumerStreams): Promise<ConsumerSummary> => {
  log.info('Consumer started...')
  log.info('Results:')

  const aggregator = createAggregator()
  for await (const line of readLines(input)) {
    const record = aggregator.add(line)
    if (record) {
      log.info(formatResult(record))
    }
  }

  const total = aggregator.total()
  log.info(`Total items processed: ${total}`)
  log.info('Consumer finished.')

  return { records: aggregator.records(), total }
}
