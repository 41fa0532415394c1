/* eslint-disable no-console */
import { runCommand } from './commands'

const main = async (): Promise<void> => {
  await runCommand(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    // Children re-run this entry point under the same runtime flags (e.g. a TypeScript loader).
    self: { command: process.execPath, args: [...process.execArgv, process.argv[1]] },
  })
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  process.exitCode = 1
})
