import { Writable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { createLogger, PipelineAbortedError } from '@stdio-pipeline/pipeline-common'
import { runPipeline } from './orchestrator'
import { createInProcessLauncher } from './transport'

const FRUIT_RECORDS = [
  'apple,5,red',
  'banana,7,yellow',
  'orange,4,orange',
  'grape,12,purple',
  'strawberry,9,red',
  'blueberry,15,blue',
  'kiwi,8,green',
]

const collect = (): { stream: Writable; lines: () => string[] } => {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { stream, lines: () => chunks.join('').split('\n').filter((line) => line.length > 0) }
}

const setup = () => {
  const stdout = collect()
  const stderr = collect()
  const launcher = createInProcessLauncher({
    output: stdout.stream,
    diagnostics: stderr.stream,
    colors: false,
  })
  const log = createLogger(stdout.stream, { colors: false })
  return { stdout, stderr, launcher, log }
}

describe('runPipeline', () => {
  it('totals the fruit dataset through transformer and consumer', async () => {
    const { stdout, launcher, log } = setup()

    const result = await runPipeline({ launcher, records: FRUIT_RECORDS, delayMs: 0, log })

    expect(result).toEqual({
      transformer: { code: 0, signal: null },
      consumer: { code: 0, signal: null },
    })
    const lines = stdout.lines()
    expect(lines[0]).toBe('Starting pipeline...')
    expect(lines.filter((line) => line.startsWith('Fruit:'))).toEqual([
      'Fruit: APPLE, Count: 10, Color: red',
      'Fruit: BANANA, Count: 14, Color: yellow',
      'Fruit: ORANGE, Count: 8, Color: orange',
      'Fruit: GRAPE, Count: 24, Color: purple',
      'Fruit: STRAWBERRY, Count: 18, Color: red',
      'Fruit: BLUEBERRY, Count: 30, Color: blue',
      'Fruit: KIWI, Count: 16, Color: green',
    ])
    expect(lines).toContain('Total items processed: 120')
    expect(lines.at(-1)).toBe('Pipeline finished.')
  })

  it('logs every record it sends in order', async () => {
    const { stdout, launcher, log } = setup()

    await runPipeline({ launcher, records: FRUIT_RECORDS, delayMs: 0, log })

    expect(stdout.lines().filter((line) => line.startsWith('Pipeline sent: '))).toEqual(
      FRUIT_RECORDS.map((record) => `Pipeline sent: ${record}`)
    )
  })

  it('drops malformed records in the transformer and zeroes bad quantities', async () => {
    const { stdout, stderr, launcher, log } = setup()

    await runPipeline({
      launcher,
      records: ['apple,5,red', 'broken', 'kiwi,lots,green'],
      delayMs: 0,
      log,
    })

    expect(stderr.lines()).toContain('Skipping invalid input: broken')
    expect(stdout.lines()).toContain('Fruit: KIWI, Count: 0, Color: green')
    expect(stdout.lines()).toContain('Total items processed: 10')
  })

  it('zeroes a quantity the transformer cannot double safely instead of failing the consumer', async () => {
    const { stdout, launcher, log } = setup()

    await runPipeline({
      launcher,
      records: ['big,5000000000000000,c', 'apple,5,red'],
      delayMs: 0,
      log,
    })

    expect(stdout.lines()).toContain('Fruit: BIG, Count: 0, Color: c')
    expect(stdout.lines()).toContain('Total items processed: 10')
  })

  it('relays every line before the consumer input closes', async () => {
    const { stdout, launcher, log } = setup()
    const records = Array.from({ length: 2000 }, (_, index) => `item${index},1,grey`)

    await runPipeline({ launcher, records, delayMs: 0, log })

    const results = stdout.lines().filter((line) => line.startsWith('Fruit:'))
    expect(results).toHaveLength(2000)
    expect(results[0]).toBe('Fruit: ITEM0, Count: 2, Color: grey')
    expect(results[1999]).toBe('Fruit: ITEM1999, Count: 2, Color: grey')
    expect(stdout.lines()).toContain('Total items processed: 4000')
  })

  it('finishes with no records', async () => {
    const { stdout, launcher, log } = setup()

    await runPipeline({ launcher, records: [], delayMs: 0, log })

    expect(stdout.lines()).toContain('Total items processed: 0')
    expect(stdout.lines().at(-1)).toBe('Pipeline finished.')
  })

  it('kills both stages and rejects when aborted', async () => {
    const { stdout, launcher, log } = setup()
    const controller = new AbortController()

    const run = runPipeline({
      launcher,
      records: FRUIT_RECORDS,
      delayMs: 60_000,
      log,
      signal: controller.signal,
    })
    setTimeout(() => controller.abort(new Error('stop requested')), 20)

    await expect(run).rejects.toThrow(new PipelineAbortedError('stop requested'))
    expect(stdout.lines()).not.toContain('Pipeline finished.')
  })

  it('rejects once the timeout elapses', async () => {
    const { launcher, log } = setup()

    await expect(
      runPipeline({ launcher, records: FRUIT_RECORDS, delayMs: 60_000, log, timeoutMs: 20 })
    ).rejects.toBeInstanceOf(PipelineAbortedError)
  })
})
