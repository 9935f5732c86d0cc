import { Command } from 'commander'
import { TraceLogger } from '../../audit/logger'
import { traceDir } from '../../config'
import { loadConfig, parseCount } from '../options'

export function traceCommands(program: Command): void {
  const trace = program.command('trace').description('Read the per-action JSONL trace')

  trace
    .command('tail')
    .description('Print the last trace entries of a day')
    .option('-n, --lines <n>', 'Number of entries', parseCount, 20)
    .option('--run <run-id>', 'Only entries of this run')
    .option('--date <yyyy-mm-dd>', 'Day to read (UTC); defaults to today')
    .option('--json', 'Print raw JSON lines')
    .action((opts: { lines: number; run?: string; date?: string; json?: boolean }, cmd: Command) => {
      const { config } = loadConfig(cmd)
      const entries = new TraceLogger(traceDir(config)).tail(opts.run, opts.lines, opts.date)
      if (entries.length === 0) { console.log('No trace entries.'); return }
      for (const e of entries) {
        if (opts.json) { console.log(JSON.stringify(e)); continue }
        const ok = e.result && e.result.success === false ? '✗' : '✓'
        const what = [e.type, e.action, e.target ? `"${e.target}"` : ''].filter(Boolean).join(' ')
        console.log(`${e.ts ?? ''}  ${e.run_id ?? '-'}  ${ok} ${what}${e.error ? `  (${e.error})` : ''}`)
      }
    })
}
