import type { Logger } from '../logger'
import { PlannedStep, dedupSteps } from './dedup'
import { stripSlash } from './fragment-matcher'
import { FragmentInput, FragmentStore, fragmentKey } from './fragment-store'

export interface RunChain {
  steps: PlannedStep[]
  /** Effective URL before the first step. */
  startUrl: string | null
  /**
   * URL after each completed raw step. Null inside a skipped stretch, where
   * only the last skipped step's destination is known.
   */
  stepEndUrls: Array<string | null>
}

export interface RecordOptions {
  minLength?: number
  enabled?: boolean
}

export function siteOf(url: string): string {
  try {
    const u = new URL(url)
    if (u.protocol !== 'http:' && u.protocol !== 'https:') return ''
    return u.hostname.toLowerCase().replace(/^www\./, '')
  } catch {
    return ''
  }
}

/** Every prefix of length ≥ minLength whose end URL is known, deduplicated per run. */
export function fragmentsFor(chain: RunChain, minLength = 2): FragmentInput[] {
  const startUrl = chain.startUrl
  if (!startUrl) return []
  const site = siteOf(startUrl)
  if (!site) return []

  const out: FragmentInput[] = []
  const seen = new Set<string>()
  for (let k = minLength; k <= chain.stepEndUrls.length && k <= chain.steps.length; k++) {
    const endUrl = chain.stepEndUrls[k - 1]
    if (!endUrl) continue
    const steps = dedupSteps(chain.steps.slice(0, k)).map((d) => ({
      action: d.step.action.toUpperCase(),
      target: d.step.target.trim(),
      value: d.step.value ?? null,
    }))
    const input: FragmentInput = { site, start_url: stripSlash(startUrl), end_url: endUrl, steps }
    const key = fragmentKey(input)
    if (seen.has(key)) continue
    seen.add(key)
    out.push(input)
  }
  return out
}

/** Upserts the run's chains; returns how many rows were inserted or confirmed. */
export async function recordFragments(
  store: FragmentStore,
  chain: RunChain,
  logger: Logger,
  opts: RecordOptions = {},
): Promise<number> {
  if (opts.enabled === false) return 0
  let saved = 0
  for (const input of fragmentsFor(chain, opts.minLength ?? 2)) {
    const { fragment, created } = await store.saveOrUpdate(input)
    saved++
    logger.info(
      { id: fragment.id, steps: fragment.steps.length, end_url: fragment.end_url, success_count: fragment.success_count },
      created ? 'fragment saved' : 'fragment confirmed',
    )
  }
  return saved
}
