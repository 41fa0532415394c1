import type { StageExit, StageName } from './types'

export type PipelineErrorCode =
  | 'RECORD_FORMAT'
  | 'TOTAL_RANGE'
  | 'STAGE_EXIT'
  | 'ABORTED'
  | 'CONFIG'

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'PipelineError'
  }
}

/**
 * Raised by the consumer when a record's quantity is not an integer.
 */
export class RecordFormatError extends PipelineError {
  constructor(public readonly line: string) {
    super('RECORD_FORMAT', `Invalid quantity in record: ${line}`)
    this.name = 'RecordFormatError'
  }
}

/**
 * Raised by the consumer when adding a record would take the total past the safe integer range.
 */
export class TotalRangeError extends PipelineError {
  constructor(public readonly line: string) {
    super('TOTAL_RANGE', `Total out of range after record: ${line}`)
    this.name = 'TotalRangeError'
  }
}

const describeExit = (exit: StageExit): string => {
  return exit.signal ? `signal ${exit.signal}` : `exit code ${exit.code ?? 'unknown'}`
}

export class StageExitError extends PipelineError {
  constructor(
    public readonly stage: StageName,
    public readonly exit: StageExit
  ) {
    super('STAGE_EXIT', `Stage ${stage} exited unexpectedly (${describeExit(exit)})`)
    this.name = 'StageExitError'
  }
}

export class PipelineAbortedError extends PipelineError {
  constructor(reason: string) {
    super('ABORTED', `Pipeline aborted: ${reason}`)
    this.name = 'PipelineAbortedError'
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('CONFIG', message)
    this.name = 'ConfigError'
  }
}
