import type { ComponentRegistry } from '../components/registry'
import type { ComponentKind, SemanticComponent } from '../components/types'
import type { ElementRef, PageDriver } from '../driver/types'
import type { ActionKind } from '../engine/types'
import { ResolutionError } from '../errors'
import type { Logger } from '../logger'
import type { CandidateRanker, RankOptions, RankedCandidate } from '../ranking/ranker'
import type { ScreenReader } from '../ranking/vision'
import type { SnapshotExtractor } from '../snapshot/extractor'
import { ElementCandidate, ElementDescriptor, ScanKind, describe } from '../snapshot/types'
import type { SelfHealingResolver } from './self-healing'

export type Resolvable = ElementCandidate | SemanticComponent

/** One concrete handle to try, best first. */
export interface Attempt {
  handle: ElementRef
  descriptor: ElementDescriptor
  score: number
  /** Present for ranked hits; healed attempts have no candidate of their own. */
  candidate?: Resolvable
}

export interface LocateRequest {
  target: string
  action: ActionKind
  /** Raw scan to include in the pool. */
  scan?: ScanKind
  /** Component kinds to include in the pool. */
  components?: ComponentKind[]
  /** Drop pool members before ranking. */
  filter?: (c: Resolvable) => boolean
  /** Cap on attempts returned; defaults to the locator's maxTries. */
  maxTries?: number
  /** Allow parent/sibling widening when nothing is accepted. */
  heal?: boolean
  rank?: RankOptions
}

export interface LocateResult {
  attempts: Attempt[]
  ranked: RankedCandidate<Resolvable>[]
  poolSize: number
  healed: boolean
}

export function handleOf(c: Resolvable): ElementRef {
  return 'action' in c ? c.action : c.handle
}

function descriptorOf(r: RankedCandidate<Resolvable>): ElementDescriptor {
  const c = r.candidate
  return describe(c, { kind: 'kind' in c ? c.kind : undefined, score: r.score })
}

/**
 * Scan + classify + rank, then the tiered acceptance decision. The accepted
 * best comes first; further candidates that clear the same tier threshold
 * follow as fallbacks for action failures.
 */
export class ElementLocator {
  constructor(
    private readonly extractor: SnapshotExtractor,
    private readonly registry: ComponentRegistry,
    readonly ranker: CandidateRanker,
    private readonly healer: SelfHealingResolver,
    private readonly logger: Logger,
    private readonly maxTries = 3,
    private readonly screenReader: ScreenReader | null = null,
  ) {}

  async pool(page: PageDriver, req: LocateRequest): Promise<Resolvable[]> {
    const pool: Resolvable[] = []
    if (req.scan) pool.push(...(await this.extractor.scan(page, req.scan, { target: req.target })))
    for (const kind of req.components ?? []) {
      if (this.registry.has(kind)) pool.push(...(await this.registry.extract(page, kind)))
    }
    return req.filter ? pool.filter(req.filter) : pool
  }

  /** `prebuilt` skips the scan when the caller already holds a pool. */
  async locate(page: PageDriver, req: LocateRequest, prebuilt?: Resolvable[]): Promise<LocateResult> {
    const pool = prebuilt ?? (await this.pool(page, req))
    const ranked = await this.ranker.rank(req.target, pool, req.action, await this.rankOptions(page, req, pool.length))
    const best = this.ranker.accept(req.target, ranked, req.action)
    const limit = req.maxTries ?? this.maxTries

    if (best) {
      const threshold = Math.min(best.score, this.ranker.thresholdFor(req.target, req.action))
      const accepted = [best, ...ranked.filter((r) => r !== best && r.score >= threshold)].slice(0, limit)
      this.logger.debug(
        { target: req.target, action: req.action, pool: pool.length, best: best.score, tries: accepted.length },
        'target resolved',
      )
      return {
        attempts: accepted.map((r) => ({ handle: handleOf(r.candidate), descriptor: descriptorOf(r), score: r.score, candidate: r.candidate })),
        ranked,
        poolSize: pool.length,
        healed: false,
      }
    }

    if (req.heal !== false && ranked.length > 0) {
      const healed = await this.healer.heal(req.target, ranked)
      if (healed) {
        const tag = await healed.handle.tagName().catch(() => healed.from.tag)
        return {
          attempts: [{
            handle: healed.handle,
            descriptor: { tag, text: healed.text.replace(/\s+/g, ' ').trim().slice(0, 80), id: '', kind: `healed:${healed.via}` },
            score: ranked[0]?.score ?? 0,
          }],
          ranked,
          poolSize: pool.length,
          healed: true,
        }
      }
    }

    return { attempts: [], ranked, poolSize: pool.length, healed: false }
  }

  /** Adds screen-read texts when a reader is wired and the strategy weights the vision signal. */
  private async rankOptions(page: PageDriver, req: LocateRequest, poolSize: number): Promise<RankOptions | undefined> {
    const weighsVision = (this.ranker.strategy.weights.vision ?? 0) > 0
    if (!this.screenReader || !weighsVision || poolSize === 0 || req.rank?.visionTexts) return req.rank
    return { ...req.rank, visionTexts: await this.screenReader.read(page) }
  }

  /** Like locate, but a miss is a ResolutionError. */
  async require(page: PageDriver, req: LocateRequest, prebuilt?: Resolvable[]): Promise<LocateResult> {
    const result = await this.locate(page, req, prebuilt)
    if (result.attempts.length === 0) throw new ResolutionError(req.target, result.ranked[0]?.score ?? 0)
    return result
  }
}
