import { isBlankUrl } from '../driver/types'
import { DedupedStep, PlannedStep, dedupSteps } from './dedup'
import type { FlowFragment, FragmentStep, FragmentStore } from './fragment-store'

export interface FragmentMatch {
  fragment: FlowFragment
  endUrl: string
  /** Raw upcoming steps the fragment replaces. */
  skip: number
}

export function stripSlash(url: string): string {
  return url.replace(/\/+$/, '')
}

/**
 * The URL a chain starts from. A fresh page that is about to NAVIGATE starts,
 * for matching purposes, at the navigation target.
 */
export function effectiveStartUrl(currentUrl: string, first?: PlannedStep): string {
  if (isBlankUrl(currentUrl) && first && first.action.toUpperCase() === 'NAVIGATE' && first.target) {
    return first.target.trim()
  }
  return currentUrl
}

const norm = (t: string | null | undefined) => (t ?? '').trim().toLowerCase()

const VALUE_ACTIONS = new Set(['TYPE', 'SELECT'])

/** Same action and target; TYPE and SELECT steps must also carry the same value. */
export function stepsMatch(a: PlannedStep[], b: FragmentStep[]): boolean {
  if (a.length !== b.length) return false
  return a.every((s, i) => {
    const action = s.action.toUpperCase()
    if (action !== b[i].action.toUpperCase() || norm(s.target) !== norm(b[i].target)) return false
    return !VALUE_ACTIONS.has(action) || norm(s.value) === norm(b[i].value)
  })
}

export class FragmentMatcher {
  constructor(private readonly store: FragmentStore) {}

  /** Longest matching fragment wins; ties go to the most confirmed one. */
  async match(currentUrl: string, upcoming: PlannedStep[]): Promise<FragmentMatch | null> {
    if (upcoming.length === 0) return null
    const deduped = dedupSteps(upcoming)
    const here = stripSlash(effectiveStartUrl(currentUrl, upcoming[0]))

    let best: FragmentMatch | null = null
    for (const fragment of await this.store.all()) {
      const n = fragment.steps.length
      if (n === 0 || n > deduped.length) continue
      if (!here.startsWith(stripSlash(fragment.start_url))) continue
      const prefix = deduped.slice(0, n)
      if (!stepsMatch(prefix.map((d) => d.step), fragment.steps)) continue
      if (
        !best ||
        n > best.fragment.steps.length ||
        (n === best.fragment.steps.length && fragment.success_count > best.fragment.success_count)
      ) {
        best = { fragment, endUrl: fragment.end_url, skip: rawSpan(prefix) }
      }
    }
    return best
  }
}

function rawSpan(prefix: DedupedStep[]): number {
  return prefix.reduce((n, d) => n + d.span, 0)
}
