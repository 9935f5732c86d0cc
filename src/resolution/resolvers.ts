import type { ElementRef, PageDriver } from '../driver/types'
import type { ExecutionStep } from '../engine/types'
import { ActionError, NavigationError, ResolutionError } from '../errors'
import { parseWaitSeconds } from '../flow/dedup'
import type { Logger } from '../logger'
import { ElementDescriptor, combinedText, describe } from '../snapshot/types'
import { waitForPageReady } from '../state/readiness'
import { PageType, expectsProductGrid } from '../state/page-type'
import { Attempt, ElementLocator, Resolvable, handleOf } from './locator'

export interface ResolverContext {
  page: PageDriver
  step: ExecutionStep
  pageType: PageType
  locator: ElementLocator
  logger: Logger
  actionTimeoutMs: number
  navigationTimeoutMs: number
  readyTimeoutMs: number
  /** Pause after submitting a search. */
  settleMs: number
}

export interface Resolution {
  element?: ElementDescriptor
  /** Ranked candidate that succeeded; feeds the history bonus after validation. */
  candidate?: Resolvable
  tries: number
}

/**
 * One entry of the ordered resolver list. The first resolver whose predicate
 * holds and that does not decline (returns null) handles the step.
 */
export interface StepResolver {
  name: string
  applies(ctx: ResolverContext): boolean
  resolve(ctx: ResolverContext): Promise<Resolution | null>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Runs `act` against each attempt until one succeeds; interaction errors move on to the next. */
async function tryEach(
  ctx: ResolverContext,
  attempts: Attempt[],
  act: (handle: ElementRef) => Promise<void>,
): Promise<Resolution> {
  let lastError = 'no candidates'
  for (let i = 0; i < attempts.length; i++) {
    const attempt = attempts[i]
    try {
      await act(attempt.handle)
      return { element: attempt.descriptor, candidate: attempt.candidate, tries: i + 1 }
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err)
      ctx.logger.debug({ target: ctx.step.target, candidate: attempt.descriptor.text, err: lastError }, 'candidate interaction failed')
    }
  }
  throw new ActionError(`${ctx.step.action} "${ctx.step.target}" failed on ${attempts.length} candidate(s): ${lastError}`)
}

async function scrollThenClick(ctx: ResolverContext, handle: ElementRef): Promise<void> {
  await handle.scrollIntoView().catch((err: unknown) => {
    ctx.logger.trace({ err: err instanceof Error ? err.message : String(err) }, 'scrollIntoView failed')
  })
  await handle.click({ timeoutMs: ctx.actionTimeoutMs })
}

const opts = (ctx: ResolverContext) => ({ timeoutMs: ctx.actionTimeoutMs })

export function isSearchInput(c: Resolvable): boolean {
  const a = c.attributes
  if (a.type === 'search' || a.role === 'searchbox') return true
  if (['q', 'query', 'search', 'k', 'keyword'].includes(a.name.toLowerCase())) return true
  return /search/.test(`${combinedText(c)} ${a.name} ${a.id} ${a.className}`.toLowerCase())
}

// ---------------------------------------------------------------------------
// Resolvers, in default order
// ---------------------------------------------------------------------------

export const navigateResolver: StepResolver = {
  name: 'navigate',
  applies: (ctx) => ctx.step.action === 'NAVIGATE',
  async resolve(ctx) {
    try {
      await ctx.page.goto(ctx.step.target, { timeoutMs: ctx.navigationTimeoutMs, waitUntil: 'domcontentloaded' })
    } catch (err) {
      throw new NavigationError(`navigation to ${ctx.step.target} failed: ${err instanceof Error ? err.message : String(err)}`)
    }
    await waitForPageReady(ctx.page, ctx.logger, ctx.readyTimeoutMs)
    return { tries: 1 }
  },
}

export const waitResolver: StepResolver = {
  name: 'wait',
  applies: (ctx) => ctx.step.action === 'WAIT',
  async resolve(ctx) {
    const seconds = parseWaitSeconds(ctx.step)
    if (seconds > 0) {
      await ctx.page.waitForTimeout(seconds * 1000)
      return { tries: 1 }
    }
    // No duration: wait for the target to show up.
    const deadline = Date.now() + ctx.actionTimeoutMs
    for (;;) {
      const found = await ctx.locator.locate(ctx.page, { target: ctx.step.target, action: 'CLICK', scan: 'clickable', heal: false })
      const first = found.attempts[0]
      if (first) return { element: first.descriptor, tries: 1 }
      if (Date.now() >= deadline) throw new ResolutionError(ctx.step.target, found.ranked[0]?.score ?? 0)
      await ctx.page.waitForTimeout(500)
    }
  },
}

export const searchResolver: StepResolver = {
  name: 'search',
  applies: (ctx) => ctx.step.action === 'TYPE' && /search/i.test(ctx.step.target),
  async resolve(ctx) {
    const inputs = (await ctx.locator.pool(ctx.page, { target: ctx.step.target, action: 'TYPE', scan: 'input' })).filter(isSearchInput)
    if (inputs.length === 0) return null
    const { attempts } = await ctx.locator.require(ctx.page, { target: ctx.step.target, action: 'TYPE', heal: false }, inputs)
    const res = await tryEach(ctx, attempts, async (handle) => {
      await handle.fill(ctx.step.value ?? '', opts(ctx))
      await handle.press('Enter', opts(ctx))
    })
    await waitForPageReady(ctx.page, ctx.logger, ctx.readyTimeoutMs)
    await ctx.page.waitForTimeout(ctx.settleMs)
    return res
  },
}

export const checkboxResolver: StepResolver = {
  name: 'checkbox',
  applies: (ctx) =>
    (ctx.step.action === 'CLICK' || ctx.step.action === 'SELECT') &&
    /checkbox|\bagree\b|\bterms\b|consent|subscribe/i.test(ctx.step.target),
  async resolve(ctx) {
    const pool = await ctx.locator.pool(ctx.page, { target: ctx.step.target, action: 'SELECT', components: ['checkbox'] })
    if (pool.length === 0) return null
    const { attempts } = await ctx.locator.require(ctx.page, { target: ctx.step.target, action: 'SELECT', heal: false }, pool)
    return tryEach(ctx, attempts, (handle) => handle.check(opts(ctx)))
  },
}

const DELIVERY_FLOOR = 0.25

export const deliveryResolver: StepResolver = {
  name: 'delivery',
  applies: (ctx) =>
    ctx.step.action === 'SELECT' && /deliver|shipping|pickup|courier/i.test(`${ctx.step.target} ${ctx.step.value ?? ''}`),
  async resolve(ctx) {
    const wanted = ctx.step.value || ctx.step.target
    const pool = await ctx.locator.pool(ctx.page, { target: wanted, action: 'SELECT', components: ['radio_option'] })
    if (pool.length === 0) return null
    const ranked = await ctx.locator.ranker.rank(wanted, pool, 'SELECT')
    const best = ranked[0]
    if (!best || best.score < DELIVERY_FLOOR) return null
    const attempt = { handle: handleOf(best.candidate), descriptor: describe(best.candidate, { score: best.score }), score: best.score, candidate: best.candidate }
    return tryEach(ctx, [attempt], (handle) => handle.click(opts(ctx)))
  },
}

export const productClickResolver: StepResolver = {
  name: 'product_click',
  applies: (ctx) =>
    ctx.step.action === 'CLICK' &&
    (ctx.step.target.length > 50 || /\b(star|model)\b/i.test(ctx.step.target) || expectsProductGrid(ctx.pageType)),
  async resolve(ctx) {
    const pool = await ctx.locator.pool(ctx.page, { target: ctx.step.target, action: 'CLICK', components: ['product_card'] })
    if (pool.length === 0) return null
    const found = await ctx.locator.locate(ctx.page, { target: ctx.step.target, action: 'CLICK', heal: false }, pool)
    if (found.attempts.length === 0) return null
    const res = await tryEach(ctx, found.attempts, (handle) => scrollThenClick(ctx, handle))
    await waitForPageReady(ctx.page, ctx.logger, ctx.readyTimeoutMs)
    return res
  },
}

export const clickResolver: StepResolver = {
  name: 'click',
  applies: (ctx) => ctx.step.action === 'CLICK',
  async resolve(ctx) {
    const { attempts } = await ctx.locator.require(ctx.page, {
      target: ctx.step.target,
      action: 'CLICK',
      scan: 'clickable',
      rank: { regionHint: ctx.step.region },
    })
    const res = await tryEach(ctx, attempts, (handle) => scrollThenClick(ctx, handle))
    await waitForPageReady(ctx.page, ctx.logger, ctx.readyTimeoutMs)
    return res
  },
}

export const typeResolver: StepResolver = {
  name: 'type',
  applies: (ctx) => ctx.step.action === 'TYPE',
  async resolve(ctx) {
    const { attempts } = await ctx.locator.require(ctx.page, {
      target: ctx.step.target,
      action: 'TYPE',
      components: ['form_input'],
      rank: { regionHint: ctx.step.region },
    })
    return tryEach(ctx, attempts, (handle) => handle.fill(ctx.step.value ?? '', opts(ctx)))
  },
}

export const selectResolver: StepResolver = {
  name: 'select',
  applies: (ctx) => ctx.step.action === 'SELECT',
  async resolve(ctx) {
    const option = ctx.step.value || ctx.step.target
    const selects = (await ctx.locator.pool(ctx.page, { target: ctx.step.target, action: 'SELECT', scan: 'input' }))
      .filter((c) => c.tag === 'select')

    if (selects.length > 0) {
      const found = await ctx.locator.locate(ctx.page, { target: ctx.step.target, action: 'SELECT', heal: false }, selects)
      let attempts = found.attempts
      // A lone dropdown is the one meant even when its label does not match.
      if (attempts.length === 0 && selects.length === 1) {
        const only = selects[0]
        attempts = [{ handle: handleOf(only), descriptor: describe(only), score: found.ranked[0]?.score ?? 0, candidate: only }]
      }
      if (attempts.length > 0) return tryEach(ctx, attempts, (handle) => handle.selectOption(option, opts(ctx)))
    }

    const { attempts } = await ctx.locator.require(ctx.page, { target: option, action: 'SELECT', components: ['radio_option'], heal: false })
    return tryEach(ctx, attempts, (handle) => handle.click(opts(ctx)))
  },
}

export function defaultResolvers(): StepResolver[] {
  return [
    navigateResolver,
    waitResolver,
    searchResolver,
    checkboxResolver,
    deliveryResolver,
    productClickResolver,
    clickResolver,
    typeResolver,
    selectResolver,
  ]
}
