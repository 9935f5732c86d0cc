import path from 'path'
import { chromium, BrowserContext } from 'playwright-core'
import { EngineConfig, profilesDir } from '../config'
import { PlaywrightPageDriver } from '../driver/playwright'
import type { PageDriver } from '../driver/types'
import type { Logger } from '../logger'

/** Hands the state machine one page for the duration of a run. */
export interface PageSession {
  acquire(): Promise<PageDriver>
  release(): Promise<void>
}

export interface BrowserSessionOptions {
  profile?: string
  headless?: boolean
  executablePath?: string
  channel?: string
}

export class BrowserSession implements PageSession {
  private context: BrowserContext | null = null
  private driver: PlaywrightPageDriver | null = null

  constructor(
    private readonly config: EngineConfig,
    private readonly logger: Logger,
    private readonly opts: BrowserSessionOptions = {},
  ) {}

  async acquire(): Promise<PageDriver> {
    if (this.driver) return this.driver
    const profile = this.opts.profile ?? 'default'
    const userDataDir = path.join(profilesDir(this.config), profile)

    const context = await chromium.launchPersistentContext(userDataDir, {
      headless: this.opts.headless ?? this.config.headless,
      executablePath: this.opts.executablePath,
      channel: this.opts.channel,
      timeout: this.config.browserTimeoutMs,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--no-first-run',
      ],
      viewport: { width: 1280, height: 720 },
    })
    context.setDefaultTimeout(this.config.browserTimeoutMs)

    const page = context.pages()[0] ?? (await context.newPage())
    page.on('pageerror', (err) => {
      this.logger.debug({ url: page.url(), err: err.message }, 'page error')
    })
    // Dialogs block every later interaction; dismiss and record them.
    page.on('dialog', async (dialog) => {
      this.logger.info({ type: dialog.type(), message: dialog.message() }, 'dialog dismissed')
      await dialog.dismiss().catch(() => { /* page may have been closed */ })
    })

    this.context = context
    this.driver = new PlaywrightPageDriver(page)
    this.logger.info({ profile, headless: this.opts.headless ?? this.config.headless }, 'browser session started')
    return this.driver
  }

  async release(): Promise<void> {
    const context = this.context
    this.context = null
    this.driver = null
    if (context) {
      await context.close()
      this.logger.info('browser session closed')
    }
  }
}
