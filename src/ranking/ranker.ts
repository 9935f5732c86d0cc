import type { ActionKind } from '../engine/types'
import type { ElementCandidate } from '../snapshot/types'
import { accessibleLabel, combinedText, historyKey, primaryText } from '../snapshot/types'
import type { SemanticScorer } from './embeddings'
import type { HistoryStore } from './history'
import { inferRegion, regionFromHint } from './regions'
import { keywordOverlap, normalize, sequenceRatio, significantWords, truncate } from './text'
import { RankingStrategy, SIGNALS, Signal, WeightTable, effectiveWeights } from './weights'

export type SignalVector = Partial<Record<Signal, number>>

export interface RankedCandidate<C extends ElementCandidate = ElementCandidate> {
  score: number
  candidate: C
  signals: SignalVector
}

export interface RankOptions {
  regionHint?: string
  /** Texts read off a screenshot by an optional screen-reading pass. */
  visionTexts?: string[]
}

type Kinded = ElementCandidate & { kind?: string }

const TEXT_INPUT_TYPES = new Set(['', 'text', 'search', 'email', 'tel', 'url', 'number', 'password'])
const CLICK_ROLES = new Set(['button', 'link', 'menuitem', 'tab', 'option'])
const SELECT_ROLES = new Set(['listbox', 'option', 'radio', 'combobox', 'checkbox'])

// ---------------------------------------------------------------------------
// Individual signals, each in [0, 1]
// ---------------------------------------------------------------------------

export function exactSignal(target: string, c: ElementCandidate): number {
  const t = normalize(target)
  return t !== '' && normalize(primaryText(c)) === t ? 1 : 0
}

/**
 * 1 when the target appears verbatim in the combined text; 0.7 when at least
 * two of its first five significant words do.
 */
export function substringSignal(target: string, c: ElementCandidate): number {
  const t = normalize(target)
  if (!t) return 0
  const hay = combinedText(c)
  if (hay.includes(t)) return 1
  const words = significantWords(t).slice(0, 5)
  const hits = words.filter((w) => hay.includes(w)).length
  return hits >= 2 ? 0.7 : 0
}

export function structuralSignal(action: ActionKind, c: Kinded): number {
  const role = c.attributes.role.toLowerCase()
  const type = c.attributes.type
  switch (action) {
    case 'CLICK':
      if (c.tag === 'a' || c.tag === 'button' || CLICK_ROLES.has(role)) return 1
      if (c.tag === 'input' && (type === 'submit' || type === 'button')) return 1
      if (c.kind === 'product_card' || c.kind === 'nav_item' || c.kind === 'button') return 1
      return 0
    case 'TYPE':
      if (c.tag === 'textarea') return 1
      return c.tag === 'input' && TEXT_INPUT_TYPES.has(type) ? 1 : 0
    case 'SELECT':
      if (c.tag === 'select' || SELECT_ROLES.has(role)) return 1
      if (c.tag === 'input' && (type === 'radio' || type === 'checkbox')) return 1
      return c.kind === 'radio_option' || c.kind === 'checkbox' ? 1 : 0
    default:
      return 0
  }
}

export function attributeSignal(target: string, c: ElementCandidate): number {
  const label = normalize(accessibleLabel(c))
  if (!label) return 0
  return sequenceRatio(truncate(normalize(target), 200), truncate(label, 200))
}

export function positionSignal(c: ElementCandidate): number {
  return c.box && c.box.y < 800 ? 1 : 0
}

export function regionSignal(hint: string | undefined, c: Kinded): number {
  const wanted = regionFromHint(hint)
  return wanted !== null && inferRegion(c) === wanted ? 1 : 0
}

export function visionSignal(c: ElementCandidate, visionTexts: string[]): number {
  const own = normalize(primaryText(c))
  if (!own) return 0
  const seen = visionTexts.map(normalize).filter(Boolean)
  if (seen.some((v) => v.includes(own) || own.includes(v))) return 1
  const words = new Set(significantWords(own))
  return seen.some((v) => significantWords(v).some((w) => words.has(w))) ? 0.6 : 0
}

export function weightedScore(signals: SignalVector, weights: WeightTable): number {
  let total = 0
  for (const signal of SIGNALS) {
    total += (weights[signal] ?? 0) * (signals[signal] ?? 0)
  }
  return total
}

const round4 = (x: number) => Math.round(x * 10000) / 10000

// ---------------------------------------------------------------------------
// Ranker
// ---------------------------------------------------------------------------

/**
 * One scoring function parameterised by a named weight table. Sorting is
 * descending by score with ties kept in document order.
 */
export class CandidateRanker {
  constructor(
    readonly strategy: RankingStrategy,
    private readonly semantic: SemanticScorer,
    private readonly history?: HistoryStore,
  ) {}

  async rank<C extends Kinded>(
    target: string,
    candidates: C[],
    action: ActionKind,
    opts: RankOptions = {},
  ): Promise<RankedCandidate<C>[]> {
    if (candidates.length === 0) return []
    const visionRan = (opts.visionTexts?.length ?? 0) > 0
    const weights = effectiveWeights(this.strategy, visionRan)
    const uses = (s: Signal) => (weights[s] ?? 0) > 0

    const semantic = uses('semantic')
      ? await this.semantic.similarities(target, candidates.map((c) => primaryText(c) || combinedText(c)))
      : []

    const ranked = candidates.map((candidate, position) => {
      const signals: SignalVector = {}
      if (uses('exact')) signals.exact = exactSignal(target, candidate)
      if (uses('substring')) signals.substring = substringSignal(target, candidate)
      if (uses('keyword')) signals.keyword = keywordOverlap(target, combinedText(candidate))
      if (uses('semantic')) signals.semantic = semantic[position] ?? 0
      if (uses('structural')) signals.structural = structuralSignal(action, candidate)
      if (uses('attribute')) signals.attribute = attributeSignal(target, candidate)
      if (uses('visibility')) signals.visibility = candidate.visible ? 1 : 0
      if (uses('position')) signals.position = positionSignal(candidate)
      if (uses('region')) signals.region = regionSignal(opts.regionHint, candidate)
      if (uses('vision') && opts.visionTexts) signals.vision = visionSignal(candidate, opts.visionTexts)

      let score = weightedScore(signals, weights)
      if (this.history?.has(action, historyKey(candidate))) score += this.strategy.historyBonus
      return { score: round4(Math.min(1, score)), candidate, signals, position }
    })

    ranked.sort((a, b) => b.score - a.score || a.position - b.position)
    return ranked.map(({ score, candidate, signals }) => ({ score, candidate, signals }))
  }

  /** Threshold the best candidate must reach before any last-resort rule. */
  thresholdFor(target: string, action: ActionKind): number {
    const t = this.strategy.thresholds
    if (t.kind === 'flat') return action === 'TYPE' || action === 'SELECT' ? t.inputThreshold : t.threshold
    return target.trim().length > t.longTargetChars ? t.long : t.standard
  }

  /** Tiered acceptance over an already ranked list. */
  accept<C extends ElementCandidate>(target: string, ranked: RankedCandidate<C>[], action: ActionKind): RankedCandidate<C> | null {
    const best = ranked[0]
    if (!best) return null
    if (best.score >= this.thresholdFor(target, action)) return best

    const t = this.strategy.thresholds
    const smallPool = ranked.length <= t.smallPool
    if (t.kind === 'flat') return smallPool && best.score >= t.smallPoolFloor ? best : null
    const long = target.trim().length > t.longTargetChars
    return best.score >= t.floor && (long || smallPool) ? best : null
  }

  async bestMatch<C extends Kinded>(
    target: string,
    candidates: C[],
    action: ActionKind,
    opts: RankOptions = {},
  ): Promise<{ best: RankedCandidate<C> | null; ranked: RankedCandidate<C>[] }> {
    const ranked = await this.rank(target, candidates, action, opts)
    return { best: this.accept(target, ranked, action), ranked }
  }

  recordSuccess(action: ActionKind, candidate: ElementCandidate): void {
    this.history?.record(action, historyKey(candidate))
  }
}

/** Every candidate at or above `threshold`, in rank order. */
export function acceptedAt<C extends ElementCandidate>(ranked: RankedCandidate<C>[], threshold: number): RankedCandidate<C>[] {
  return ranked.filter((r) => r.score >= threshold)
}
