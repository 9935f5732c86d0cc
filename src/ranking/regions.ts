import type { ElementCandidate } from '../snapshot/types'

export type Region = 'header' | 'sidebar' | 'product_grid' | 'main'

const HEADER_MAX_Y = 200
const SIDEBAR_MAX_X = 300

/** Bounding-box heuristics; product markers win over position. */
export function inferRegion(c: ElementCandidate & { kind?: string }): Region {
  if (c.kind === 'product_card' || /product/i.test(c.attributes.className)) return 'product_grid'
  const box = c.box
  if (!box) return 'main'
  if (box.y < HEADER_MAX_Y) return 'header'
  if (box.x < SIDEBAR_MAX_X) return 'sidebar'
  return 'main'
}

const HINT_ALIASES: Array<[RegExp, Region]> = [
  [/header|nav|top|menu/, 'header'],
  [/sidebar|side|left|filter/, 'sidebar'],
  [/product|grid|listing|result/, 'product_grid'],
  [/main|content|body/, 'main'],
]

export function regionFromHint(hint: string | undefined): Region | null {
  if (!hint) return null
  const h = hint.toLowerCase()
  for (const [pattern, region] of HINT_ALIASES) {
    if (pattern.test(h)) return region
  }
  return null
}
