import type { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import {
  PipelineAbortedError,
  readLines,
  StageExitError,
  type Logger,
  type StageExit,
  type StageLauncher,
  writeRecords,
} from '@stdio-pipeline/pipeline-common'

export interface PipelineOptions {
  launcher: StageLauncher
  records: readonly string[]
  /** Pause after each record sent to the transformer. */
  delayMs: number
  log: Logger
  signal?: AbortSignal
  /** Aborts the run after this many milliseconds; 0 waits without limit. */
  timeoutMs?: number
}

export interface PipelineResult {
  transformer: StageExit
  consumer: StageExit
}

const combineSignals = (signal?: AbortSignal, timeoutMs = 0): AbortSignal | undefined => {
  const signals: AbortSignal[] = []
  if (signal) {
    signals.push(signal)
  }
  if (timeoutMs > 0) {
    signals.push(AbortSignal.timeout(timeoutMs))
  }
  if (signals.length <= 1) {
    return signals[0]
  }
  return AbortSignal.any(signals)
}

const describeReason = (reason: unknown): string => {
  return reason instanceof Error ? reason.message : String(reason)
}

const isCleanExit = (exit: StageExit): boolean => exit.code === 0 && exit.signal === null

async function* relayLines(source: Readable): AsyncGenerator<string> {
  for await (const line of readLines(source)) {
    yield `${line}\n`
  }
}

/**
 * Runs records through a transformer stage into a consumer stage.
 *
 * The consumer is launched first, then the transformer. Two tasks run side by
 * side: the feed writes the paced records into the transformer and ends its
 * input, and the relay copies the transformer's output line by line into the
 * consumer, ending the consumer's input once the transformer's output ends.
 * The run resolves after both tasks have drained and both stages have exited.
 *
 * @throws StageExitError when a stage exits with a non-zero code or a signal.
 * @throws PipelineAbortedError when the signal aborts or the timeout elapses;
 * both stages are killed first.
 */
export const runPipeline = async (options: PipelineOptions): Promise<PipelineResult> => {
  const { launcher, records, delayMs, log } = options
  const signal = combineSignals(options.signal, options.timeoutMs)

  log.info('Starting pipeline...')

  const consumer = launcher.launch('consumer', { captureOutput: false })
  const transformer = launcher.launch('transformer', { captureOutput: true })

  const stopStages = (): void => {
    transformer.kill()
    consumer.kill()
  }

  const transformerOutput = transformer.output
  if (!transformerOutput) {
    stopStages()
    throw new Error('Transformer output is not captured')
  }

  signal?.addEventListener('abort', stopStages, { once: true })

  try {
    const relay = pipeline(transformerOutput, relayLines, consumer.input)
    const feed = writeRecords(transformer.input, records, {
      delayMs,
      log,
      label: 'Pipeline sent',
      signal,
    })
    const exits = Promise.all([transformer.exited, consumer.exited])

    const [, , [transformerExit, consumerExit]] = await Promise.all([feed, relay, exits])

    if (!isCleanExit(transformerExit)) {
      throw new StageExitError('transformer', transformerExit)
    }
    if (!isCleanExit(consumerExit)) {
      throw new StageExitError('consumer', consumerExit)
    }

    log.info('Pipeline finished.')
    return { transformer: transformerExit, consumer: consumerExit }
  } catch (error) {
    stopStages()
    if (signal?.aborted) {
      throw new PipelineAbortedError(describeReason(signal.reason))
    }
    throw error
  } finally {
    signal?.removeEventListener('abort', stopStages)
  }
}
