import type { ElementRef, PageDriver } from '../driver/types'
import type { Logger } from '../logger'
import { toCandidate } from '../snapshot/extractor'
import { withTimeout } from '../util/async'
import { firstLine, firstOf, labelElement, labelText } from './labels'
import type { ComponentExtractor, ComponentKind, ComponentSlots, SemanticComponent } from './types'

export const CARD_SELECTOR = [
  "div[class*='product']",
  "article[class*='product']",
  "[data-testid*='product']",
  '.product-card',
  '.product-item',
  "[class*='ProductCard']",
].join(', ')

export const NAV_SELECTOR = [
  'nav a',
  "[role='navigation'] a",
  'header a',
  "[class*='nav'] a",
  "[class*='menu'] a",
].join(', ')

export const BUTTON_SELECTOR = [
  'button',
  "[role='button']",
  "a[class*='btn']",
  "input[type='submit']",
  "input[type='button']",
].join(', ')

export const MODAL_SELECTOR = ["[role='dialog']", '.modal', "[class*='modal']", "[class*='overlay']", 'dialog'].join(', ')

const NON_TEXT_INPUT_TYPES = new Set(['hidden', 'radio', 'checkbox', 'submit', 'button', 'image', 'reset', 'file'])

export interface ExtractorLimits {
  elementTimeoutMs: number
  cards: number
  inputs: number
  options: number
  navItems: number
  buttons: number
  modals: number
  cardTextMin: number
  cardTextMax: number
  navTextMax: number
}

export const DEFAULT_LIMITS: ExtractorLimits = {
  elementTimeoutMs: 2000,
  cards: 80,
  inputs: 50,
  options: 50,
  navItems: 80,
  buttons: 80,
  modals: 5,
  cardTextMin: 20,
  cardTextMax: 800,
  navTextMax: 80,
}

type Build = (page: PageDriver, handle: ElementRef) => Promise<SemanticComponent | null>

/**
 * Shared loop: every node is time-boxed and may fail on its own without
 * ending the pass. Stops once `cap` components are built.
 */
function collector(
  kind: ComponentKind,
  selector: string,
  cap: number,
  limits: ExtractorLimits,
  logger: Logger,
  build: Build,
): ComponentExtractor {
  return async (page) => {
    const out: SemanticComponent[] = []
    for (const handle of await page.locateAll(selector)) {
      if (out.length >= cap) break
      try {
        const component = await withTimeout(build(page, handle), limits.elementTimeoutMs, `${kind} extraction`)
        if (!component) continue
        component.index = out.length
        out.push(component)
      } catch (err) {
        logger.trace({ kind, err: err instanceof Error ? err.message : String(err) }, 'component skipped')
      }
    }
    return out
  }
}

async function component(
  page: PageDriver,
  kind: ComponentKind,
  handle: ElementRef,
  action: ElementRef,
  slots: ComponentSlots,
): Promise<SemanticComponent | null> {
  const base = await toCandidate(page, handle)
  if (!base) return null
  return { ...base, kind, action, slots }
}

// ---------------------------------------------------------------------------
// Per-kind discovery rules
// ---------------------------------------------------------------------------

export function productCards(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  const inner = collector('product_card', CARD_SELECTOR, limits.cards, limits, logger, async (page, card) => {
    if (!(await card.isVisible())) return null
    const raw = await card.innerText()
    const length = raw.trim().length
    if (length < limits.cardTextMin || length > limits.cardTextMax) return null

    let anchor: ElementRef | null = null
    for (const a of await card.locateAll('a[href]')) {
      if (await a.isVisible()) { anchor = a; break }
    }
    if (!anchor) return null

    return component(page, 'product_card', card, anchor, {
      primaryText: firstLine(raw),
      href: (await anchor.getAttribute('href')) ?? '',
    })
  })

  // Nested product-ish wrappers often share one anchor; keep the outermost.
  return async (page) => {
    const seen = new Set<string>()
    const cards = (await inner(page)).filter((c) => {
      const key = `${c.slots.href}|${c.slots.primaryText}`
      if (seen.has(key)) return false
      seen.add(key)
      return true
    })
    cards.forEach((c, i) => { c.index = i })
    return cards
  }
}

export function formInputs(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  return collector('form_input', 'input, textarea, select', limits.inputs, limits, logger, async (page, input) => {
    const type = ((await input.getAttribute('type')) ?? '').toLowerCase()
    if (NON_TEXT_INPUT_TYPES.has(type)) return null
    const id = (await input.getAttribute('id')) ?? ''
    const label = firstOf(
      await labelText(page, input, id),
      await input.getAttribute('placeholder'),
      await input.getAttribute('aria-label'),
      await input.getAttribute('name'),
      await input.tagName(),
    )
    return component(page, 'form_input', input, input, { label })
  })
}

/** Radios and checkboxes are often visually hidden behind a styled label. */
function optionExtractor(kind: 'radio_option' | 'checkbox', logger: Logger, limits: ExtractorLimits): ComponentExtractor {
  const selector = kind === 'radio_option' ? "input[type='radio']" : "input[type='checkbox']"
  return collector(kind, selector, limits.options, limits, logger, async (page, input) => {
    const id = (await input.getAttribute('id')) ?? ''
    const labelEl = await labelElement(page, input, id)
    const labelTextValue = labelEl ? (await labelEl.innerText()).replace(/\s+/g, ' ').trim() : ''
    const fallback = kind === 'radio_option'
      ? firstOf(await input.getAttribute('aria-label'), await input.getAttribute('value'))
      : firstOf(await input.getAttribute('aria-label'), await parentText(input))
    const label = firstOf(labelTextValue, fallback)
    const checked = await input.isChecked()

    if (await input.isVisible()) {
      const built = await component(page, kind, input, input, { label, checked })
      if (built) built.attributes.label = label
      return built
    }
    if (labelEl && (await labelEl.isVisible())) {
      return component(page, kind, labelEl, labelEl, { label, checked })
    }
    return null
  })
}

async function parentText(el: ElementRef): Promise<string> {
  const parent = await el.parent()
  return parent ? (await parent.innerText()).trim() : ''
}

export function radioOptions(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  return optionExtractor('radio_option', logger, limits)
}

export function checkboxes(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  return optionExtractor('checkbox', logger, limits)
}

export function navItems(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  return collector('nav_item', NAV_SELECTOR, limits.navItems, limits, logger, async (page, link) => {
    const text = (await link.innerText()).trim()
    if (!text || text.length > limits.navTextMax) return null
    return component(page, 'nav_item', link, link, { href: (await link.getAttribute('href')) ?? '' })
  })
}

export function buttons(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  return collector('button', BUTTON_SELECTOR, limits.buttons, limits, logger, async (page, button) => {
    return component(page, 'button', button, button, {})
  })
}

export function modals(logger: Logger, limits: ExtractorLimits = DEFAULT_LIMITS): ComponentExtractor {
  return collector('modal', MODAL_SELECTOR, limits.modals, limits, logger, async (page, modal) => {
    return component(page, 'modal', modal, modal, { primaryText: firstLine(await modal.innerText()) })
  })
}
