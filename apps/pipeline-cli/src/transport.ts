import { spawn as spawnProcess, type ChildProcess, type SpawnOptions } from 'node:child_process'
import { once, type EventEmitter } from 'node:events'
import { PassThrough, type Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import {
  createLogger,
  type LaunchOptions,
  type Logger,
  type StageExit,
  type StageHandle,
  type StageLauncher,
  type StageName,
} from '@stdio-pipeline/pipeline-common'
import { runConsumer } from './consumer'
import { runTransformer } from './transformer'

/**
 * The part of a ChildProcess the launcher relies on.
 */
export type SpawnedChild = EventEmitter & Pick<ChildProcess, 'stdin' | 'stdout' | 'kill'>

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedChild

const defaultSpawn: SpawnFunction = (command, args, options) => spawnProcess(command, args, options)

export interface ChildProcessLauncherOptions {
  /** Executable that understands the stage names as its first argument. */
  command: string
  /** Arguments placed before the stage name, e.g. the entry script. */
  args: readonly string[]
  /** Arguments placed after the stage name. */
  stageArgs?: readonly string[]
  /** Merged over the parent's environment. */
  env?: Record<string, string>
  spawn?: SpawnFunction
}

const waitForExit = (child: SpawnedChild): Promise<StageExit> => {
  return new Promise((resolve, reject) => {
    child.once('error', reject)
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal })
    })
  })
}

/**
 * Launches each stage as a child process with its input piped, its output
 * piped when captured (inherited otherwise) and its diagnostics inherited.
 */
export const createChildProcessLauncher = (options: ChildProcessLauncherOptions): StageLauncher => {
  const spawn = options.spawn ?? defaultSpawn

  const launch = (stage: StageName, { captureOutput }: LaunchOptions): StageHandle => {
    const child = spawn(options.command, [...options.args, stage, ...(options.stageArgs ?? [])], {
      env: { ...process.env, ...(options.env ?? {}) },
      stdio: ['pipe', captureOutput ? 'pipe' : 'inherit', 'inherit'],
    })

    const input = child.stdin
    if (!input) {
      child.kill()
      throw new Error(`Stage ${stage} was spawned without a writable input`)
    }
    if (captureOutput && !child.stdout) {
      child.kill()
      throw new Error(`Stage ${stage} was spawned without a readable output`)
    }

    return {
      name: stage,
      input,
      output: captureOutput ? child.stdout : null,
      exited: waitForExit(child),
      kill: () => {
        child.kill()
      },
    }
  }

  return { launch }
}

export interface InProcessLauncherOptions {
  /** Shared stream that receives the output of stages launched without capture. */
  output: Writable
  /** Shared diagnostic channel. */
  diagnostics: Writable
  colors?: boolean
}

const KILLED: StageExit = { code: null, signal: 'SIGTERM' }

/**
 * Runs stages inside this process, joined to the orchestrator by in-memory channels.
 * A stage that throws logs the error and reports exit code 1.
 */
export const createInProcessLauncher = (options: InProcessLauncherOptions): StageLauncher => {
  const launch = (stage: StageName, { captureOutput }: LaunchOptions): StageHandle => {
    const input = new PassThrough()
    const output = new PassThrough()
    if (!captureOutput) {
      output.pipe(options.output, { end: false })
    }
    const diagnostics: Logger = createLogger(options.diagnostics, { colors: options.colors })
    const stopped = new AbortController()

    const execute = async (): Promise<void> => {
      if (stage === 'transformer') {
        await runTransformer({ input, output, log: diagnostics })
      } else {
        await runConsumer({ input, log: createLogger(output, { colors: options.colors }) })
      }
      if (!captureOutput) {
        if (!output.writableEnded) {
          output.end()
        }
        await finished(output)
      }
    }

    const settled = execute().then(
      (): StageExit => ({ code: 0, signal: null }),
      (error: unknown): StageExit => {
        if (stopped.signal.aborted) {
          return KILLED
        }
        diagnostics.error(error instanceof Error ? error.message : String(error))
        return { code: 1, signal: null }
      }
    )
    const killed = once(stopped.signal, 'abort').then((): StageExit => KILLED)

    return {
      name: stage,
      input,
      output: captureOutput ? output : null,
      exited: Promise.race([settled, killed]),
      kill: () => {
        stopped.abort()
        input.destroy()
        output.destroy()
      },
    }
  }

  return { launch }
}
