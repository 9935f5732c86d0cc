import { Command } from 'commander'
import fs from 'fs'
import path from 'path'
import { BrowserSession } from '../../browser/session'
import { defaultRegistry } from '../../components/registry'
import { COMPONENT_KINDS } from '../../components/types'
import { screenshotsDir } from '../../config'
import { SnapshotExtractor } from '../../snapshot/extractor'
import { primaryText } from '../../snapshot/types'
import { pageTypeOf } from '../../state/page-type'
import { waitForPageReady } from '../../state/readiness'
import { loadConfig } from '../options'

interface ScanOptions {
  headed?: boolean
  limit: string
  screenshot?: boolean
  json?: boolean
}

export function scanCommand(program: Command): void {
  program
    .command('scan <url>')
    .description('Open a page and print its page type, classified components and clickables')
    .option('--headed', 'Show the browser window')
    .option('-n, --limit <n>', 'Entries per section', '15')
    .option('--screenshot', 'Save a screenshot under the data directory')
    .option('--json', 'Print JSON instead of text')
    .action(async (url: string, opts: ScanOptions, cmd: Command) => {
      const { config, logger } = loadConfig(cmd, opts.headed ? { headless: false } : {})
      const limit = parseInt(opts.limit)
      const session = new BrowserSession(config, logger)
      try {
        const page = await session.acquire()
        await page.goto(url, { timeoutMs: config.browserTimeoutMs })
        await waitForPageReady(page, logger)

        const pageType = await pageTypeOf(page)
        const components = await defaultRegistry(logger).classify(page, [...COMPONENT_KINDS])
        const clickables = await new SnapshotExtractor(logger, { clickableCap: config.scanCap }).scan(page, 'clickable')

        let shot: string | null = null
        if (opts.screenshot) {
          const dir = screenshotsDir(config)
          fs.mkdirSync(dir, { recursive: true })
          shot = path.join(dir, `scan-${Date.now()}.png`)
          fs.writeFileSync(shot, await page.screenshot())
        }

        if (opts.json) {
          const summary: Record<string, string[]> = {}
          for (const [kind, list] of components) summary[kind] = list.slice(0, limit).map(primaryText)
          console.log(JSON.stringify({
            url: page.url(),
            page_type: pageType,
            components: summary,
            clickables: clickables.slice(0, limit).map(primaryText),
            screenshot: shot,
          }, null, 2))
          return
        }

        console.log(`${page.url()}  [${pageType}]`)
        for (const [kind, list] of components) {
          if (list.length === 0) continue
          console.log(`\n${kind} (${list.length})`)
          for (const c of list.slice(0, limit)) console.log(`  ${primaryText(c) || '(no text)'}`)
        }
        console.log(`\nclickable (${clickables.length})`)
        for (const c of clickables.slice(0, limit)) console.log(`  <${c.tag}> ${primaryText(c) || '(no text)'}`)
        if (shot) console.log(`\nScreenshot: ${shot}`)
      } finally {
        await session.release()
      }
    })
}
