import type { ElementRef } from '../driver/types'
import type { Logger } from '../logger'
import type { RankedCandidate } from '../ranking/ranker'
import { normalize, significantWords } from '../ranking/text'
import type { ElementCandidate } from '../snapshot/types'

export interface HealResult {
  handle: ElementRef
  via: 'parent' | 'sibling'
  text: string
  from: ElementCandidate
}

export interface SelfHealingOptions {
  /** How many of the best misses to widen around. */
  topN?: number
  /** Require the sibling to share a significant word with the target. Off by default. */
  requireSiblingRelevance?: boolean
}

export function textRelevant(target: string, text: string): boolean {
  const t = normalize(target)
  const s = normalize(text)
  if (!t || !s) return false
  if (s.includes(t)) return true
  return significantWords(t).some((w) => s.includes(w))
}

/**
 * Shallow widening around the best-scoring misses: first each miss's parent,
 * then each miss's following sibling.
 */
export class SelfHealingResolver {
  private readonly topN: number
  private readonly requireSiblingRelevance: boolean

  constructor(private readonly logger: Logger, opts: SelfHealingOptions = {}) {
    this.topN = opts.topN ?? 3
    this.requireSiblingRelevance = opts.requireSiblingRelevance ?? false
  }

  async heal(target: string, misses: RankedCandidate[]): Promise<HealResult | null> {
    const top = misses.slice(0, this.topN)

    for (const miss of top) {
      try {
        const parent = await miss.candidate.handle.parent()
        if (!parent || !(await parent.isVisible())) continue
        const text = await parent.innerText()
        if (textRelevant(target, text)) {
          this.logger.debug({ target, from: miss.candidate.text.slice(0, 60) }, 'healed via parent')
          return { handle: parent, via: 'parent', text, from: miss.candidate }
        }
      } catch (err) {
        this.logger.trace({ err: err instanceof Error ? err.message : String(err) }, 'parent lookup failed')
      }
    }

    // TODO: make requireSiblingRelevance the default once it is shown to cost no resolutions.
    for (const miss of top) {
      try {
        const sibling = await miss.candidate.handle.nextSibling()
        if (!sibling || !(await sibling.isVisible())) continue
        const text = await sibling.innerText()
        if (this.requireSiblingRelevance && !textRelevant(target, text)) continue
        this.logger.debug({ target, from: miss.candidate.text.slice(0, 60) }, 'healed via sibling')
        return { handle: sibling, via: 'sibling', text, from: miss.candidate }
      } catch (err) {
        this.logger.trace({ err: err instanceof Error ? err.message : String(err) }, 'sibling lookup failed')
      }
    }
    return null
  }
}
