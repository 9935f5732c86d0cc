import { Command } from 'commander'
import { fragmentsFile } from '../../config'
import { FragmentStore } from '../../flow/fragment-store'
import { loadConfig, parseCount } from '../options'

function openStore(cmd: Command): FragmentStore {
  const { config, logger } = loadConfig(cmd)
  return new FragmentStore(fragmentsFile(config), logger, { ttlDays: config.fragmentTtlDays })
}

export function fragmentsCommands(program: Command): void {
  const fragments = program.command('fragments').description('Inspect and evict recorded flow fragments')

  fragments
    .command('list')
    .description('List recorded fragments, most confirmed first')
    .option('--site <host>', 'Only fragments for this site')
    .option('--json', 'Print JSON')
    .action(async (opts: { site?: string; json?: boolean }, cmd: Command) => {
      const all = (await openStore(cmd).all())
        .filter((f) => !opts.site || f.site === opts.site)
        .sort((a, b) => b.success_count - a.success_count || a.id - b.id)
      if (opts.json) { console.log(JSON.stringify(all, null, 2)); return }
      if (all.length === 0) { console.log('No fragments.'); return }
      for (const f of all) {
        console.log(`  #${f.id}  ${f.site}  ${f.steps.length} steps  ×${f.success_count}  last used ${f.last_used_at}`)
        console.log(`      ${f.start_url} → ${f.end_url}`)
        console.log(`      ${f.steps.map((s) => `${s.action} ${s.target}`).join(' | ')}`)
      }
    })

  fragments
    .command('prune')
    .description('Drop stale or rarely confirmed fragments')
    .option('--older-than <days>', 'Not used for this many days', parseCount)
    .option('--min-success <n>', 'Confirmed fewer times than this', parseCount)
    .option('--site <host>', 'Only fragments for this site')
    .action(async (opts: { olderThan?: number; minSuccess?: number; site?: string }, cmd: Command) => {
      if (opts.olderThan === undefined && opts.minSuccess === undefined) {
        throw new Error('give --older-than and/or --min-success')
      }
      const removed = await openStore(cmd).prune({ olderThanDays: opts.olderThan, minSuccess: opts.minSuccess, site: opts.site })
      console.log(`✓ Pruned ${removed} fragment(s)`)
    })

  fragments
    .command('clear')
    .description('Delete every recorded fragment')
    .action(async (_opts: object, cmd: Command) => {
      const removed = await openStore(cmd).clear()
      console.log(`✓ Cleared ${removed} fragment(s)`)
    })
}
