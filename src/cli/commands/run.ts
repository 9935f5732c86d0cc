import { Command } from 'commander'
import fs from 'fs'
import type { ConfigOverrides } from '../../config'
import { createEngine } from '../../engine/factory'
import { JsonPlanner, parseSteps } from '../../engine/planner'
import type { ExecutionStep } from '../../engine/types'
import { loadConfig, parseCount, parseVariant } from '../options'

interface RunOptions {
  steps?: string
  instruction?: string
  report?: string
  headed?: boolean
  maxRecovery?: number
  ranker?: ReturnType<typeof parseVariant>
  profile?: string
  fragments: boolean
  vision?: boolean
}

export function runCommand(program: Command): void {
  program
    .command('run [plan]')
    .description('Execute a plan file, inline steps, or a free-text instruction in a browser')
    .option('--steps <json>', 'Inline JSON step list')
    .option('-i, --instruction <text>', 'Free-text task, planned by the configured model')
    .option('-r, --report <file>', 'Write the run report to a file')
    .option('--headed', 'Show the browser window')
    .option('--max-recovery <n>', 'Recovery attempts per step', parseCount)
    .option('--ranker <variant>', 'Ranking strategy (legacy|production|fused)', parseVariant)
    .option('--profile <name>', 'Browser profile directory name', 'default')
    .option('--no-fragments', 'Neither reuse nor record flow fragments')
    .option('--vision', 'Read the screen with the configured model for the fused ranker')
    .action(async (plan: string | undefined, opts: RunOptions, cmd: Command) => {
      const overrides: ConfigOverrides = { fragmentsEnabled: opts.fragments }
      if (opts.headed) overrides.headless = false
      if (opts.maxRecovery !== undefined) overrides.maxRecoveryAttempts = opts.maxRecovery
      if (opts.ranker) overrides.rankerVariant = opts.ranker
      if (opts.vision) overrides.visionEnabled = true
      const { config, logger } = loadConfig(cmd, overrides)

      let input: string | ExecutionStep[]
      if (opts.steps) input = parseSteps(JSON.parse(opts.steps))
      else if (plan) input = await new JsonPlanner(plan).plan()
      else if (opts.instruction) input = opts.instruction
      else throw new Error('give a plan file, --steps or --instruction')

      const engine = createEngine(config, logger, { sessionOptions: { profile: opts.profile }, persistHistory: true })
      try {
        const report = await engine.run(input)
        const json = JSON.stringify(report, null, 2)
        if (opts.report) {
          fs.writeFileSync(opts.report, json)
          console.log(`Report written to ${opts.report}`)
        } else {
          console.log(json)
        }
        const status = report.success ? '✓' : '✗'
        console.log(`${status} ${report.steps_executed}/${report.total_steps} steps` +
          (report.skipped_steps ? `, ${report.skipped_steps} skipped via shortcuts` : '') +
          (report.error ? `: ${report.error}` : ''))
        if (!report.success) process.exitCode = 1
      } finally {
        await engine.close()
      }
    })
}
