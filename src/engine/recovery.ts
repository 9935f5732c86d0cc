import { z } from 'zod'
import type { Logger } from '../logger'
import { normalize, sequenceRatio } from '../ranking/text'
import type { Completion } from './llm'
import type { ActionKind } from './types'

export interface RecoverySuggestion {
  alternativeTarget?: string
  waitTimeSeconds?: number
  description?: string
}

export interface PageContext {
  url: string
  title: string
}

/** Advisory only: proposes, never acts. The state machine applies at most the first suggestion. */
export interface RecoveryAdvisor {
  suggestRecovery(
    action: ActionKind,
    target: string,
    error: string,
    availableTexts: string[],
    ctx: PageContext,
  ): Promise<RecoverySuggestion[]>
}

export class NoopRecoveryAdvisor implements RecoveryAdvisor {
  async suggestRecovery(): Promise<RecoverySuggestion[]> {
    return []
  }
}

const DEFAULT_SYNONYMS: Record<string, string[]> = {
  'add to cart': ['add to bag', 'add to basket', 'buy now'],
  'buy now': ['add to cart', 'proceed to buy'],
  checkout: ['proceed to checkout', 'place order', 'continue'],
  'sign in': ['log in', 'login', 'account'],
  'log in': ['sign in', 'login'],
  continue: ['next', 'proceed', 'save and continue'],
  search: ['find', 'go'],
  cart: ['bag', 'basket'],
  submit: ['send', 'continue', 'save'],
}

/**
 * Offline advisor. Suggests a synonym or the closest visible text as an
 * alternative target, and a short wait when the failure looks like timing.
 */
export class TableRecoveryAdvisor implements RecoveryAdvisor {
  constructor(
    private readonly synonyms: Record<string, string[]> = DEFAULT_SYNONYMS,
    private readonly waitSeconds = 2,
  ) {}

  async suggestRecovery(
    _action: ActionKind,
    target: string,
    error: string,
    availableTexts: string[],
    _ctx?: PageContext,
  ): Promise<RecoverySuggestion[]> {
    const out: RecoverySuggestion[] = []
    const t = normalize(target)
    const visible = availableTexts.map((text) => ({ text, norm: normalize(text) })).filter((v) => v.norm)

    for (const [phrase, alternatives] of Object.entries(this.synonyms)) {
      if (!t.includes(phrase)) continue
      for (const alt of alternatives) {
        const hit = visible.find((v) => v.norm.includes(alt))
        if (hit) out.push({ alternativeTarget: hit.text, description: `synonym "${alt}" for "${phrase}"` })
      }
    }

    let closest: { text: string; score: number } | null = null
    for (const v of visible) {
      if (v.norm === t) continue
      const score = sequenceRatio(t, v.norm)
      if (score >= 0.6 && (!closest || score > closest.score)) closest = { text: v.text, score }
    }
    if (closest) out.push({ alternativeTarget: closest.text, description: `closest visible text (${closest.score.toFixed(2)})` })

    if (/timeout|timed out|not visible|could not resolve/i.test(error)) {
      out.push({ waitTimeSeconds: this.waitSeconds, description: 'wait for late content' })
    }
    return out
  }
}

// ---------------------------------------------------------------------------
// Model-backed advisor
// ---------------------------------------------------------------------------

const SuggestionsSchema = z.object({
  strategies: z
    .array(
      z.object({
        description: z.string().default(''),
        alternative_target: z.string().nullish(),
        wait_time: z.coerce.number().nonnegative().nullish(),
      }),
    )
    .default([]),
})

const SYSTEM_PROMPT = 'You diagnose UI automation failures and suggest recovery strategies. Reply with JSON only.'

export class OpenAIRecoveryAdvisor implements RecoveryAdvisor {
  constructor(private readonly complete: Completion, private readonly logger: Logger) {}

  async suggestRecovery(
    action: ActionKind,
    target: string,
    error: string,
    availableTexts: string[],
    ctx: PageContext,
  ): Promise<RecoverySuggestion[]> {
    const user = [
      `Failed action: ${action}`,
      `Target element: "${target}"`,
      `Error: ${error}`,
      `Page: ${ctx.title} (${ctx.url})`,
      'Available elements:',
      ...availableTexts.slice(0, 20).filter(Boolean).map((t) => `- ${t}`),
      '',
      'Return {"strategies":[{"description":"...","alternative_target":"text or null","wait_time":seconds or null}]},',
      'at most three, most likely first.',
    ].join('\n')

    try {
      const parsed = SuggestionsSchema.parse(JSON.parse(await this.complete(SYSTEM_PROMPT, user)))
      return parsed.strategies.map((s) => ({
        alternativeTarget: s.alternative_target ?? undefined,
        waitTimeSeconds: s.wait_time ?? undefined,
        description: s.description,
      }))
    } catch (err) {
      this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'recovery advisor failed')
      return []
    }
  }
}
