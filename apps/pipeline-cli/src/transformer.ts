import type { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import {
  formatRecord,
  parseInteger,
  readLines,
  splitFields,
  type PipelineRecord,
  type StageStreams,
} from '@stdio-pipeline/pipeline-common'

export type TransformResult =
  | { kind: 'skipped'; line: string }
  | { kind: 'transformed'; line: string; record: PipelineRecord; output: string }

/**
 * Upper-cases the name and doubles the quantity of a record line.
 * Lines with fewer than three fields are skipped; a quantity that is not an
 * integer, or whose double is not a safe integer, becomes 0 instead.
 * @param line Raw record line.
 */
export const transformLine = (line: string): TransformResult => {
  const fields = splitFields(line)
  if (!fields) {
    return { kind: 'skipped', line }
  }

  const [name, quantity, attribute] = fields
  const parsed = parseInteger(quantity)
  const doubled = parsed === null ? 0 : parsed * 2
  const record: PipelineRecord = {
    name: name.toUpperCase(),
    quantity: Number.isSafeInteger(doubled) ? doubled : 0,
    attribute,
  }

  return { kind: 'transformed', line, record, output: formatRecord(record) }
}

/**
 * Streams records from input to output through {@link transformLine} and ends
 * the output once the input is exhausted.
 */
export const runTransformer = async ({ input, output, log }: StageStreams): Promise<void> => {
  log.info('Transformer started...')

  await pipeline(
    input,
    async function* (source: Readable): AsyncGenerator<string> {
      for await (const line of readLines(source)) {
        const result = transformLine(line)
        if (result.kind === 'skipped') {
          log.warn(`Skipping invalid input: ${line}`)
          continue
        }
        yield `${result.output}\n`
        log.info(`Transformed: ${line} -> ${result.output}`)
      }
    },
    output
  )

  log.info('Transformer finished.')
}
