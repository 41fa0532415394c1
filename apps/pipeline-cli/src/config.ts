import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import * as yaml from 'js-yaml'
import { ConfigError } from '@stdio-pipeline/pipeline-common'

/**
 * Settings shared by the generator and the orchestrator.
 */
export interface PipelineConfig {
  /** Record lines, in emission order. */
  records: string[]
  /** Pause after each emitted record. */
  delayMs: number
  /** Limit for a pipeline run; 0 waits without limit. */
  timeoutMs: number
}

/**
 * Options accepted after the command name.
 */
export interface CliOptions {
  configFile: string
  delayMs?: number
  timeoutMs?: number
  inProcess: boolean
  /** Undefined lets each stream decide. */
  colors?: boolean
  help: boolean
}

export const DEFAULT_CONFIG_FILE = fileURLToPath(new URL('../pipeline.yaml', import.meta.url))

const DEFAULT_DELAY_MS = 500
const DEFAULT_TIMEOUT_MS = 0

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const parseNonNegativeInteger = (value: string, flag: string): number => {
  const parsed = Number(value)
  if (value.trim().length === 0 || !Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid value for ${flag}: ${value}`)
  }
  return parsed
}

/**
 * Parses the options that follow the command name.
 * @param argv Arguments after the command.
 * @throws ConfigError for unknown flags, missing values and invalid numbers.
 */
export const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {
    configFile: DEFAULT_CONFIG_FILE,
    inProcess: false,
    help: false,
  }

  const getValue = (index: number, flag: string): string => {
    const value = argv[index]
    if (value == null) {
      throw new ConfigError(`Missing value for ${flag}`)
    }
    return value
  }

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]

    if (arg === '--help' || arg === '-h') {
      options.help = true
      continue
    }

    if (arg === '--config') {
      options.configFile = getValue(i + 1, arg)
      i += 1
      continue
    }

    if (arg === '--delay') {
      options.delayMs = parseNonNegativeInteger(getValue(i + 1, arg), arg)
      i += 1
      continue
    }

    if (arg === '--timeout') {
      options.timeoutMs = parseNonNegativeInteger(getValue(i + 1, arg), arg)
      i += 1
      continue
    }

    if (arg === '--in-process') {
      options.inProcess = true
      continue
    }

    if (arg === '--no-color') {
      options.colors = false
      continue
    }

    throw new ConfigError(`Unknown argument: ${arg}`)
  }

  return options
}

const readDuration = (
  document: Record<string, unknown>,
  key: string,
  fallback: number,
  source: string
): number => {
  const value = document[key]
  if (value === undefined || value === null) {
    return fallback
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${source}: ${key} must be a non-negative integer`)
  }
  return value
}

/**
 * Validates a loaded YAML document.
 * @param source Name used in error messages.
 * @throws ConfigError when a key has the wrong shape.
 */
export const parseConfigDocument = (document: unknown, source: string): PipelineConfig => {
  if (!isRecord(document)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`)
  }

  const records = document.records
  if (!Array.isArray(records)) {
    throw new ConfigError(`${source}: records must be a list`)
  }
  const lines: string[] = []
  for (const entry of records) {
    if (typeof entry !== 'string') {
      throw new ConfigError(`${source}: every record must be a string, got ${JSON.stringify(entry)}`)
    }
    lines.push(entry)
  }

  return {
    records: lines,
    delayMs: readDuration(document, 'delayMs', DEFAULT_DELAY_MS, source),
    timeoutMs: readDuration(document, 'timeoutMs', DEFAULT_TIMEOUT_MS, source),
  }
}

export const loadConfigFile = async (filePath: string): Promise<PipelineConfig> => {
  const contents = await readFile(filePath, 'utf8')
  let document: unknown
  try {
    document = yaml.load(contents, { filename: filePath })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`${filePath}: ${message}`)
  }
  return parseConfigDocument(document, filePath)
}

/**
 * Loads the configuration file named by the options and applies flag overrides.
 */
export const resolveConfig = async (options: CliOptions): Promise<PipelineConfig> => {
  const config = await loadConfigFile(options.configFile)
  return {
    ...config,
    delayMs: options.delayMs ?? config.delayMs,
    timeoutMs: options.timeoutMs ?? config.timeoutMs,
  }
}
