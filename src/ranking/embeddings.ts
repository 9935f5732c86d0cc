import OpenAI from 'openai'
import type { EngineConfig } from '../config'
import type { Logger } from '../logger'
import { normalize, sequenceRatio, subsequenceRatio, truncate } from './text'

export interface TextEmbedder {
  embed(texts: string[]): Promise<number[][]>
}

export class OpenAIEmbedder implements TextEmbedder {
  constructor(private readonly client: OpenAI, private readonly model: string) {}

  async embed(texts: string[]): Promise<number[][]> {
    const res = await this.client.embeddings.create({ model: this.model, input: texts })
    return [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding)
  }
}

export function createEmbedder(config: EngineConfig): TextEmbedder | null {
  if (!config.openaiApiKey) return null
  return new OpenAIEmbedder(new OpenAI({ apiKey: config.openaiApiKey }), config.embeddingModel)
}

// ---------------------------------------------------------------------------
// Bounded LRU keyed by normalized text
// ---------------------------------------------------------------------------

export class LruCache<V> {
  private readonly map = new Map<string, V>()

  constructor(private readonly capacity: number) {}

  get(key: string): V | undefined {
    const v = this.map.get(key)
    if (v === undefined) return undefined
    this.map.delete(key)
    this.map.set(key, v)
    return v
  }

  set(key: string, value: V): void {
    if (this.map.has(key)) this.map.delete(key)
    this.map.set(key, value)
    while (this.map.size > this.capacity) {
      const oldest = this.map.keys().next()
      if (oldest.done) break
      this.map.delete(oldest.value)
    }
  }

  get size(): number {
    return this.map.size
  }

  clear(): void {
    this.map.clear()
  }
}

export function cosine(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length)
  let dot = 0
  let na = 0
  let nb = 0
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i]
    na += a[i] * a[i]
    nb += b[i] * b[i]
  }
  if (na === 0 || nb === 0) return 0
  return dot / (Math.sqrt(na) * Math.sqrt(nb))
}

/**
 * Character-sequence similarity used when no embedding model is available.
 * Long targets (product titles) blend in-order character coverage, and a
 * verbatim containment scores at least 0.9.
 */
export function fallbackSimilarity(target: string, text: string): number {
  const t = normalize(target)
  const s = normalize(text)
  if (!t || !s) return 0
  const fuzzy = sequenceRatio(truncate(t, 200), truncate(s, 200))
  if (t.length <= 40) return fuzzy
  let score = 0.6 * subsequenceRatio(t, s) + 0.4 * fuzzy
  if (s.includes(t)) score = Math.max(score, 0.9)
  return score
}

const clamp01 = (x: number) => Math.min(1, Math.max(0, x))

export class SemanticScorer {
  private readonly cache: LruCache<number[]>
  private degraded = false

  constructor(
    private readonly embedder: TextEmbedder | null,
    private readonly logger: Logger,
    cacheSize = 1000,
  ) {
    this.cache = new LruCache(cacheSize)
  }

  get usesEmbeddings(): boolean {
    return this.embedder !== null && !this.degraded
  }

  get cacheSize(): number {
    return this.cache.size
  }

  /** Similarity of `target` to each text, in [0, 1]. */
  async similarities(target: string, texts: string[]): Promise<number[]> {
    if (this.embedder && !this.degraded) {
      try {
        const vectors = await this.vectors(this.embedder, [target, ...texts])
        const [t, ...rest] = vectors
        return rest.map((v) => clamp01(cosine(t, v)))
      } catch (err) {
        // Stay on the character fallback for the rest of the session.
        this.degraded = true
        this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'embedding model unavailable, using sequence similarity')
      }
    }
    return texts.map((text) => fallbackSimilarity(target, text))
  }

  private async vectors(embedder: TextEmbedder, texts: string[]): Promise<number[][]> {
    const keys = texts.map((t) => truncate(normalize(t), 512))
    const missing = [...new Set(keys.filter((k) => this.cache.get(k) === undefined))]
    if (missing.length > 0) {
      const embedded = await embedder.embed(missing.map((k) => k || ' '))
      missing.forEach((k, i) => this.cache.set(k, embedded[i] ?? []))
    }
    // Entries just written may have been evicted by a small cache; recompute those.
    const out: number[][] = []
    for (const k of keys) {
      const hit = this.cache.get(k)
      if (hit) { out.push(hit); continue }
      const [v] = await embedder.embed([k || ' '])
      out.push(v ?? [])
    }
    return out
  }
}
