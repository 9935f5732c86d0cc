#!/usr/bin/env node
import { Command } from 'commander'
import { fragmentsCommands } from './commands/fragments'
import { runCommand } from './commands/run'
import { scanCommand } from './commands/scan'
import { traceCommands } from './commands/trace'
import { parseLogLevel } from './options'

const program = new Command()

program
  .name('surefoot')
  .description('Resolve and verify natural-language browser steps')
  .version('0.1.0')
  .option('-d, --data-dir <dir>', 'Data directory (default ~/.surefoot)')
  .option('-l, --log-level <level>', 'Log level (trace|debug|info|warn|error|silent)', parseLogLevel)

runCommand(program)
scanCommand(program)
fragmentsCommands(program)
traceCommands(program)

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
