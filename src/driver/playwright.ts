import type { Locator, Page } from 'playwright-core'
import type { ActionOptions, Box, ElementRef, LoadState, PageDriver, ScrollMetrics } from './types'

// ---------------------------------------------------------------------------
// ElementRef over a Playwright locator pinned to a single node
// ---------------------------------------------------------------------------

export class PlaywrightElement implements ElementRef {
  constructor(private readonly loc: Locator) {}

  async tagName(): Promise<string> {
    return this.loc.evaluate((el) => el.tagName.toLowerCase())
  }

  async isVisible(): Promise<boolean> {
    if (!(await this.loc.isVisible())) return false
    // Playwright treats opacity:0 as visible; the engine does not.
    return this.loc.evaluate((el) => {
      for (let node: Element | null = el; node; node = node.parentElement) {
        if (getComputedStyle(node).opacity === '0') return false
      }
      return true
    })
  }

  isEnabled(): Promise<boolean> {
    return this.loc.isEnabled()
  }

  async isChecked(): Promise<boolean> {
    return this.loc.evaluate((el) => el instanceof HTMLInputElement && el.checked)
  }

  innerText(): Promise<string> {
    return this.loc.innerText()
  }

  async inputValue(): Promise<string> {
    return this.loc.inputValue()
  }

  getAttribute(name: string): Promise<string | null> {
    return this.loc.getAttribute(name)
  }

  boundingBox(): Promise<Box | null> {
    return this.loc.boundingBox()
  }

  async locateAll(selector: string): Promise<ElementRef[]> {
    const all = await this.loc.locator(selector).all()
    return all.map((l) => new PlaywrightElement(l))
  }

  async parent(): Promise<ElementRef | null> {
    return this.single(this.loc.locator('xpath=..'))
  }

  async nextSibling(): Promise<ElementRef | null> {
    return this.single(this.loc.locator('xpath=following-sibling::*[1]'))
  }

  async ancestor(tag: string): Promise<ElementRef | null> {
    return this.single(this.loc.locator(`xpath=ancestor::${tag.toLowerCase()}[1]`))
  }

  async click(opts: ActionOptions): Promise<void> {
    await this.loc.click({ timeout: opts.timeoutMs })
  }

  async fill(value: string, opts: ActionOptions): Promise<void> {
    await this.loc.fill(value, { timeout: opts.timeoutMs })
  }

  async press(key: string, opts: ActionOptions): Promise<void> {
    await this.loc.press(key, { timeout: opts.timeoutMs })
  }

  async selectOption(label: string, opts: ActionOptions): Promise<void> {
    await this.loc.selectOption({ label }, { timeout: opts.timeoutMs })
  }

  async check(opts: ActionOptions): Promise<void> {
    await this.loc.check({ timeout: opts.timeoutMs })
  }

  async scrollIntoView(): Promise<void> {
    await this.loc.scrollIntoViewIfNeeded()
  }

  private async single(loc: Locator): Promise<ElementRef | null> {
    return (await loc.count()) > 0 ? new PlaywrightElement(loc.first()) : null
  }
}

// ---------------------------------------------------------------------------
// PageDriver over a Playwright page
// ---------------------------------------------------------------------------

export class PlaywrightPageDriver implements PageDriver {
  constructor(readonly page: Page) {}

  url(): string {
    return this.page.url()
  }

  title(): Promise<string> {
    return this.page.title()
  }

  async locateAll(selector: string): Promise<ElementRef[]> {
    const all = await this.page.locator(selector).all()
    return all.map((l) => new PlaywrightElement(l))
  }

  async goto(url: string, opts: { timeoutMs?: number; waitUntil?: LoadState } = {}): Promise<void> {
    await this.page.goto(url, { timeout: opts.timeoutMs, waitUntil: opts.waitUntil ?? 'domcontentloaded' })
  }

  async contentSnapshot(): Promise<string> {
    const html = await this.page.content()
    const formState = await this.page.evaluate(() =>
      Array.from(document.querySelectorAll('input, textarea, select'))
        .map((el) => {
          if (el instanceof HTMLInputElement) return `${el.name}=${el.value}:${el.checked ? 1 : 0}`
          if (el instanceof HTMLTextAreaElement) return `${el.name}=${el.value}`
          if (el instanceof HTMLSelectElement) return `${el.name}#${el.selectedIndex}`
          return ''
        })
        .join('|'),
    )
    return `${html}\n${formState}`
  }

  async scrollMetrics(): Promise<ScrollMetrics> {
    return this.page.evaluate(() => ({
      y: window.scrollY,
      height: document.documentElement.scrollHeight,
      viewport: window.innerHeight,
    }))
  }

  async scrollTo(y: number): Promise<void> {
    await this.page.evaluate((top) => window.scrollTo(0, top), y)
  }

  screenshot(): Promise<Buffer> {
    return this.page.screenshot({ fullPage: false })
  }

  async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState(state, { timeout: timeoutMs })
  }

  waitForTimeout(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms)
  }
}
