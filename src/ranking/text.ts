// ---------------------------------------------------------------------------
// Text normalization and similarity helpers shared by the ranker, the
// self-healing resolver and the flow cache.
// ---------------------------------------------------------------------------

export function normalize(text: string | null | undefined): string {
  return (text ?? '').toLowerCase().replace(/\s+/g, ' ').trim()
}

/**
 * Significant tokens: alphanumeric runs of two or more characters, with
 * decimals kept whole ("1.5" stays one token). Order of first occurrence, no
 * duplicates.
 */
export function tokens(text: string): string[] {
  const found = normalize(text).match(/[a-z0-9]+(?:\.[0-9]+)*/g) ?? []
  return [...new Set(found.filter((t) => t.length >= 2))]
}

/** Words longer than two characters, in order, used for loose overlap checks. */
export function significantWords(text: string): string[] {
  return normalize(text)
    .split(/[^a-z0-9.]+/)
    .map((w) => w.replace(/^\.+|\.+$/g, ''))
    .filter((w) => w.length > 2)
}

export function keywordOverlap(target: string, haystack: string): number {
  const toks = tokens(target)
  if (toks.length === 0) return 0
  const hay = normalize(haystack)
  const hits = toks.filter((t) => hay.includes(t)).length
  return hits / toks.length
}

/**
 * Ratcliff/Obershelp similarity: 2·M / (|a| + |b|) where M is the number of
 * characters in recursively found longest common blocks.
 */
export function sequenceRatio(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1
  if (a.length === 0 || b.length === 0) return 0
  return (2 * matchingChars(a, b)) / (a.length + b.length)
}

function matchingChars(a: string, b: string): number {
  const [start, otherStart, size] = longestCommonBlock(a, b)
  if (size === 0) return 0
  return (
    size +
    matchingChars(a.slice(0, start), b.slice(0, otherStart)) +
    matchingChars(a.slice(start + size), b.slice(otherStart + size))
  )
}

function longestCommonBlock(a: string, b: string): [number, number, number] {
  let best: [number, number, number] = [0, 0, 0]
  let prev = new Array<number>(b.length + 1).fill(0)
  for (let i = 1; i <= a.length; i++) {
    const row = new Array<number>(b.length + 1).fill(0)
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        row[j] = prev[j - 1] + 1
        if (row[j] > best[2]) best = [i - row[j], j - row[j], row[j]]
      }
    }
    prev = row
  }
  return best
}

/**
 * Fraction of `needle` characters that appear in order inside `haystack`.
 * Used for long titles that pages truncate or reflow.
 */
export function subsequenceRatio(needle: string, haystack: string): number {
  if (needle.length === 0) return 0
  let j = 0
  let matched = 0
  for (let i = 0; i < needle.length && j < haystack.length; i++) {
    const at = haystack.indexOf(needle[i], j)
    if (at === -1) continue
    matched++
    j = at + 1
  }
  return matched / needle.length
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text
}
