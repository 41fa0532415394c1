import type { Readable, Writable } from 'node:stream'
import { createLogger } from '@stdio-pipeline/pipeline-common'
import { parseArgs, resolveConfig, type CliOptions } from './config'
import { runConsumer } from './consumer'
import { runGenerator } from './generator'
import { runPipeline } from './orchestrator'
import { runTransformer } from './transformer'
import {
  createChildProcessLauncher,
  createInProcessLauncher,
  type SpawnFunction,
} from './transport'

export const COMMANDS = ['generator', 'transformer', 'consumer', 'run-pipeline'] as const

export type Command = (typeof COMMANDS)[number]

export const usage = `Usage: pipeline-cli <command> [options]

Commands:
  generator          Write the sample records to stdout
  transformer        Transform records from stdin to stdout
  consumer           Total the records from stdin
  run-pipeline       Feed the records through transformer and consumer processes

Options:
  --config <file>    YAML configuration file (default: pipeline.yaml next to the app)
  --delay <ms>       Pause after each generated record (default: from config)
  --timeout <ms>     Abort run-pipeline after this long; 0 waits forever (default: from config)
  --in-process       Run the pipeline stages in this process over in-memory streams
  --no-color         Disable colored diagnostics
  -h, --help         Show this help message
`

/**
 * Process-level resources a command runs against.
 */
export interface CommandContext {
  stdin: Readable
  stdout: Writable
  stderr: Writable
  /** Executable and leading arguments that start this program again. */
  self: { command: string; args: readonly string[] }
  spawn?: SpawnFunction
}

const isCommand = (value: string): value is Command => {
  return COMMANDS.some((command) => command === value)
}

const runPipelineCommand = async (options: CliOptions, context: CommandContext): Promise<void> => {
  const config = await resolveConfig(options)
  const launcher = options.inProcess
    ? createInProcessLauncher({
        output: context.stdout,
        diagnostics: context.stderr,
        colors: options.colors,
      })
    : createChildProcessLauncher({
        command: context.self.command,
        args: context.self.args,
        stageArgs: options.colors === false ? ['--no-color'] : [],
        spawn: context.spawn,
      })

  await runPipeline({
    launcher,
    records: config.records,
    delayMs: config.delayMs,
    timeoutMs: config.timeoutMs,
    log: createLogger(context.stdout, { colors: options.colors }),
  })
}

/**
 * Dispatches a command line to one of the stages or the orchestrator.
 * A missing or unknown command prints the usage and returns normally.
 * @param argv Arguments after the executable and script.
 */
export const runCommand = async (argv: string[], context: CommandContext): Promise<void> => {
  const [name, ...rest] = argv
  const printUsage = (): void => {
    context.stdout.write(usage)
  }

  if (name == null || name === '--help' || name === '-h') {
    printUsage()
    return
  }

  const command = name.toLowerCase()
  if (!isCommand(command)) {
    context.stdout.write(`Unknown command: ${name}\n`)
    printUsage()
    return
  }

  const options = parseArgs(rest)
  if (options.help) {
    printUsage()
    return
  }

  switch (command) {
    case 'generator': {
      const config = await resolveConfig(options)
      await runGenerator({
        records: config.records,
        delayMs: config.delayMs,
        output: context.stdout,
        log: createLogger(context.stderr, { colors: options.colors }),
      })
      return
    }
    case 'transformer':
      await runTransformer({
        input: context.stdin,
        output: context.stdout,
        log: createLogger(context.stderr, { colors: options.colors }),
      })
      return
    case 'consumer':
      await runConsumer({
        input: context.stdin,
        log: createLogger(context.stdout, { colors: options.colors }),
      })
      return
    case 'run-pipeline':
      await runPipelineCommand(options, context)
      return
  }
}
