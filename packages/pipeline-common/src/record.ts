import type { PipelineRecord } from './types'

export const FIELD_SEPARATOR = ','
export const FIELD_COUNT = 3

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/

/**
 * Splits a wire line into its fields.
 * @param line Raw record line without its terminator.
 * @returns The fields, or null when the line has fewer than three.
 */
export const splitFields = (line: string): string[] | null => {
  const fields = line.split(FIELD_SEPARATOR)
  return fields.length < FIELD_COUNT ? null : fields
}

/**
 * Parses a decimal integer with an optional sign and surrounding whitespace.
 * @returns The value, or null when the text is not a safe integer.
 */
export const parseInteger = (text: string): number | null => {
  if (!INTEGER_PATTERN.test(text)) {
    return null
  }
  const value = Number(text)
  return Number.isSafeInteger(value) ? value : null
}

export const formatRecord = (record: PipelineRecord): string => {
  return [record.name, String(record.quantity), record.attribute].join(FIELD_SEPARATOR)
}
