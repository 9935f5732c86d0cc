import type { ElementRef, PageDriver } from '../driver/types'
import type { Logger } from '../logger'
import { normalize, truncate } from '../ranking/text'
import { expectsProductGrid, pageTypeOf } from '../state/page-type'
import { withTimeout } from '../util/async'
import { CandidateAttributes, ElementCandidate, ScanKind, combinedText } from './types'

export const CLICKABLE_SELECTOR = [
  'a',
  'button',
  "[role='button']",
  "[role='link']",
  'div[onclick]',
  'span[onclick]',
  "input[type='submit']",
  "input[type='button']",
].join(', ')

export const INPUT_SELECTOR = 'input, textarea, select'

const TEXT_LIMIT = 500

export interface ExtractorOptions {
  clickableCap?: number
  inputCap?: number
  elementTimeoutMs?: number
  /** Pause after each scroll so lazily rendered content can mount. */
  settleMs?: number
}

export interface ScanOptions {
  /** Candidates containing this text survive the cap first. */
  target?: string
  /** Force (or suppress) the multi-position scroll pass; default follows the page type. */
  scrollForLazy?: boolean
}

export class SnapshotExtractor {
  private readonly clickableCap: number
  private readonly inputCap: number
  private readonly elementTimeoutMs: number
  private readonly settleMs: number

  constructor(private readonly logger: Logger, opts: ExtractorOptions = {}) {
    this.clickableCap = opts.clickableCap ?? 200
    this.inputCap = opts.inputCap ?? 50
    this.elementTimeoutMs = opts.elementTimeoutMs ?? 2000
    this.settleMs = opts.settleMs ?? 300
  }

  async scan(page: PageDriver, kind: ScanKind, opts: ScanOptions = {}): Promise<ElementCandidate[]> {
    const selector = kind === 'clickable' ? CLICKABLE_SELECTOR : INPUT_SELECTOR
    const cap = kind === 'clickable' ? this.clickableCap : this.inputCap
    const scroll = opts.scrollForLazy ?? expectsProductGrid(await pageTypeOf(page))

    const found = scroll
      ? await this.scanScrolled(page, selector, kind)
      : await this.collect(page, selector, kind, (await page.scrollMetrics()).y)

    const capped = capCandidates(found, cap, opts.target)
    capped.forEach((c, i) => { c.index = i })
    this.logger.debug({ kind, found: found.length, kept: capped.length, scrolled: scroll }, 'scan complete')
    return capped
  }

  /** Visit top, middle and bottom, union what each position shows, then restore. */
  private async scanScrolled(page: PageDriver, selector: string, kind: ScanKind): Promise<ElementCandidate[]> {
    const metrics = await page.scrollMetrics()
    const maxY = Math.max(0, metrics.height - metrics.viewport)
    const positions = [...new Set([0, Math.round(maxY / 2), maxY])]

    const seen = new Set<string>()
    const out: ElementCandidate[] = []
    try {
      for (const y of positions) {
        await page.scrollTo(y)
        await page.waitForTimeout(this.settleMs)
        for (const c of await this.collect(page, selector, kind, y)) {
          const key = dedupKey(c)
          if (seen.has(key)) continue
          seen.add(key)
          out.push(c)
        }
      }
    } finally {
      await page.scrollTo(metrics.y)
    }
    return out
  }

  private async collect(page: PageDriver, selector: string, kind: ScanKind, scrollY: number): Promise<ElementCandidate[]> {
    const handles = await page.locateAll(selector)
    const out: ElementCandidate[] = []
    for (const handle of handles) {
      try {
        const c = await withTimeout(toCandidate(page, handle, scrollY), this.elementTimeoutMs, 'element extraction')
        if (!c) continue
        if (kind === 'input' && c.attributes.type === 'hidden') continue
        c.index = out.length
        out.push(c)
      } catch (err) {
        this.logger.trace({ err: err instanceof Error ? err.message : String(err) }, 'element skipped')
      }
    }
    return out
  }
}

/**
 * Reads everything the ranker needs from one handle. Returns null for nodes
 * that are not visible.
 */
export async function toCandidate(page: PageDriver, handle: ElementRef, scrollY = 0): Promise<ElementCandidate | null> {
  if (!(await handle.isVisible())) return null
  const box = await handle.boundingBox()
  if (!box || box.width <= 0 || box.height <= 0) return null

  const tag = await handle.tagName()
  const attr = async (name: string) => (await handle.getAttribute(name)) ?? ''
  const attributes: CandidateAttributes = {
    id: await attr('id'),
    className: await attr('class'),
    role: await attr('role'),
    type: (await attr('type')).toLowerCase(),
    name: await attr('name'),
    href: await attr('href'),
    placeholder: await attr('placeholder'),
    ariaLabel: await attr('aria-label'),
    title: await attr('title'),
    value: tag === 'input' ? await attr('value') : '',
    label: '',
  }
  if (tag === 'input' || tag === 'textarea' || tag === 'select') {
    attributes.label = await labelFor(page, handle, attributes.id)
  }

  const text = tag === 'select' || tag === 'input' || tag === 'textarea' ? '' : cleanText(await handle.innerText())
  const parent = await handle.parent()
  const ancestorText = parent ? cleanText(await parent.innerText()) : ''

  return {
    index: 0,
    tag,
    text: truncate(text, TEXT_LIMIT),
    ancestorText: truncate(ancestorText, TEXT_LIMIT),
    attributes,
    box: { ...box, y: box.y + scrollY },
    visible: true,
    handle,
  }
}

/** `label[for=id]` first, then an enclosing `<label>`. */
export async function labelFor(page: PageDriver, handle: ElementRef, id: string): Promise<string> {
  if (id) {
    const labels = await page.locateAll(`label[for="${cssString(id)}"]`)
    for (const label of labels) {
      const text = cleanText(await label.innerText())
      if (text) return text
    }
  }
  const wrapping = await handle.ancestor('label')
  return wrapping ? cleanText(await wrapping.innerText()) : ''
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export function cssString(value: string): string {
  return value.replace(/["\\]/g, '\\$&')
}

function dedupKey(c: ElementCandidate): string {
  const b = c.box
  const where = b ? `${Math.round(b.x)},${Math.round(b.y)},${Math.round(b.width)},${Math.round(b.height)}` : '-'
  return `${c.tag}|${c.text.slice(0, 100)}|${where}`
}

/**
 * Keep at most `cap` candidates. Literal target matches are retained first,
 * the rest fill in document order; the result stays in document order.
 */
export function capCandidates(candidates: ElementCandidate[], cap: number, target?: string): ElementCandidate[] {
  if (candidates.length <= cap) return candidates
  const needle = normalize(target)
  const keep = new Set<ElementCandidate>()
  if (needle) {
    for (const c of candidates) {
      if (keep.size >= cap) break
      if (combinedText(c).includes(needle)) keep.add(c)
    }
  }
  for (const c of candidates) {
    if (keep.size >= cap) break
    keep.add(c)
  }
  return candidates.filter((c) => keep.has(c))
}
