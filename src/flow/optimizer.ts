import type { PageDriver } from '../driver/types'
import type { Logger } from '../logger'
import { pageTypeOf } from '../state/page-type'
import type { PlannedStep } from './dedup'
import { FragmentMatcher, effectiveStartUrl, stripSlash } from './fragment-matcher'
import type { StateShortcutRegistry, UrlShortcutRegistry } from './shortcuts'

export type Optimization =
  | { type: 'fragment'; url: string; skip: number; fragmentId: number }
  | { type: 'url_shortcut' | 'state_shortcut'; url: string; skip: 1 }

/**
 * Tries, in order, a recorded chain, a URL shortcut and a page-state shortcut
 * for the upcoming steps. Shortcut tiers only replace CLICK steps.
 */
export class FlowOptimizer {
  constructor(
    private readonly logger: Logger,
    private readonly matcher: FragmentMatcher | null,
    private readonly urlShortcuts: UrlShortcutRegistry | null,
    private readonly stateShortcuts: StateShortcutRegistry | null,
  ) {}

  async optimize(page: PageDriver, upcoming: PlannedStep[]): Promise<Optimization | null> {
    const first = upcoming[0]
    if (!first) return null
    const currentUrl = page.url()

    if (this.matcher) {
      try {
        const hit = await this.matcher.match(currentUrl, upcoming)
        if (hit) return { type: 'fragment', url: hit.endUrl, skip: hit.skip, fragmentId: hit.fragment.id }
      } catch (err) {
        this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'fragment lookup failed')
      }
    }

    if (first.action.toUpperCase() !== 'CLICK') return null
    const here = effectiveStartUrl(currentUrl, first)
    const notHere = (url: string | null) => (url && stripSlash(url) !== stripSlash(here) ? url : null)

    const viaUrl = notHere(this.urlShortcuts?.resolve(here, first.target) ?? null)
    if (viaUrl) return { type: 'url_shortcut', url: viaUrl, skip: 1 }

    if (this.stateShortcuts) {
      const pageType = await pageTypeOf(page)
      const viaState = notHere(this.stateShortcuts.resolve(here, pageType, first.target))
      if (viaState) return { type: 'state_shortcut', url: viaState, skip: 1 }
    }
    return null
  }
}
