import type { Readable, Writable } from 'node:stream'
import type { Logger } from './logger'

/**
 * Defines the canonical record shape carried between stages.
 */
export interface PipelineRecord {
  name: string
  quantity: number
  attribute: string
}

/**
 * Names of the stages that can run as their own process.
 */
export type StageName = 'transformer' | 'consumer'

/**
 * Streams handed to a stage that reads records and writes records.
 */
export interface StageStreams {
  input: Readable
  output: Writable
  log: Logger
}

/**
 * Exit status of a launched stage. A null code means the stage was stopped by a signal.
 */
export interface StageExit {
  code: number | null
  signal: NodeJS.Signals | null
}

/**
 * A launched stage with independently addressable byte streams.
 */
export interface StageHandle {
  readonly name: StageName
  readonly input: Writable
  /** Present only when the stage was launched with its output captured. */
  readonly output: Readable | null
  readonly exited: Promise<StageExit>
  kill: () => void
}

export interface LaunchOptions {
  captureOutput: boolean
}

/**
 * Starts stages over some byte-stream transport (OS pipes or in-memory channels).
 */
export interface StageLauncher {
  launch: (stage: StageName, options: LaunchOptions) => StageHandle
}
