import { Readable, Writable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { readLines, writeRecords } from './lines'
import { createLogger } from './logger'

const collectItems = async <T>(source: AsyncIterable<T>): Promise<T[]> => {
  const items: T[] = []
  for await (const item of source) {
    items.push(item)
  }
  return items
}

/** Records data writes and log lines in a single sequence. */
const createJournal = (options: { highWaterMark?: number; async?: boolean } = {}) => {
  const events: string[] = []
  const output = new Writable({
    highWaterMark: options.highWaterMark,
    write(chunk, _encoding, callback) {
      events.push(`write ${String(chunk)}`)
      if (options.async) {
        setImmediate(callback)
      } else {
        callback()
      }
    },
  })
  const diagnostics = new Writable({
    write(chunk, _encoding, callback) {
      events.push(`log ${String(chunk)}`)
      callback()
    },
  })
  return { events, output, log: createLogger(diagnostics, { colors: false }) }
}

describe('readLines', () => {
  it('splits chunks on newlines regardless of chunk boundaries', async () => {
    const input = Readable.from(['app', 'le,5,red\nbana', 'na,7,yellow\r\nkiwi,8,green'])
    expect(await collectItems(readLines(input))).toEqual([
      'apple,5,red',
      'banana,7,yellow',
      'kiwi,8,green',
    ])
  })

  it('yields nothing for an empty stream', async () => {
    expect(await collectItems(readLines(Readable.from([])))).toEqual([])
  })
})

describe('writeRecords', () => {
  it('logs each record after the stream has taken it', async () => {
    const { events, output, log } = createJournal()

    await writeRecords(output, ['apple,5,red', 'kiwi,8,green'], {
      delayMs: 0,
      log,
      label: 'Generated',
    })

    expect(events).toEqual([
      'write apple,5,red\n',
      'log Generated: apple,5,red\n',
      'write kiwi,8,green\n',
      'log Generated: kiwi,8,green\n',
    ])
    expect(output.writableFinished).toBe(true)
  })

  it('waits for drain when the stream is full', async () => {
    const { events, output, log } = createJournal({ highWaterMark: 1, async: true })

    await writeRecords(output, ['apple,5,red', 'banana,7,yellow', 'kiwi,8,green'], {
      delayMs: 0,
      log,
      label: 'Sent',
    })

    expect(events).toEqual([
      'write apple,5,red\n',
      'log Sent: apple,5,red\n',
      'write banana,7,yellow\n',
      'log Sent: banana,7,yellow\n',
      'write kiwi,8,green\n',
      'log Sent: kiwi,8,green\n',
    ])
  })

  it('rejects with the stream error when the output fails', async () => {
    const { output, log } = createJournal()
    const run = writeRecords(output, ['apple,5,red', 'kiwi,8,green'], {
      delayMs: 60_000,
      log,
      label: 'Sent',
    })

    setTimeout(() => output.destroy(new Error('write EPIPE')), 10)
    await expect(run).rejects.toThrow('write EPIPE')
  })

  it('stops waiting when the signal aborts', async () => {
    const { events, output, log } = createJournal()
    const controller = new AbortController()
    const run = writeRecords(output, ['apple,5,red', 'kiwi,8,green'], {
      delayMs: 60_000,
      log,
      label: 'Sent',
      signal: controller.signal,
    })

    setTimeout(() => controller.abort(), 10)
    await expect(run).rejects.toMatchObject({ name: 'AbortError' })
    expect(events).toEqual(['write apple,5,red\n', 'log Sent: apple,5,red\n'])
  })
})
