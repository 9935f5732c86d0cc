import type { PageDriver } from '../driver/types'

export const PAGE_TYPES = [
  'homepage',
  'listing',
  'product_detail',
  'checkout',
  'address_entry',
  'payment',
  'confirmation',
  'search_results',
  'unknown',
] as const

export type PageType = (typeof PAGE_TYPES)[number]

type Rule = { type: PageType; patterns: RegExp[]; urlOnly?: boolean }

// Most specific first; the first rule with a hit wins.
const RULES: Rule[] = [
  { type: 'confirmation', patterns: [/confirm/, /thank/, /order.?placed/, /\bsuccess\b/] },
  { type: 'payment', patterns: [/payment/, /\bpay\b/, /billing/] },
  { type: 'address_entry', patterns: [/address/, /delivery/, /shipping/] },
  { type: 'checkout', patterns: [/checkout/, /\/cart\b/, /\bcart\b/, /\bbag\b/] },
  { type: 'product_detail', patterns: [/\/p\//, /\/product\//, /-p-\d/, /\/dp\//] },
  { type: 'search_results', patterns: [/search\?/, /[?&]q=/] },
  { type: 'listing', patterns: [/product.*list/, /categor/, /listing/, /\/c\//, /collections?\//, /[?&]page=\d/] },
  { type: 'homepage', patterns: [/^https?:\/\/[^/]+\/?$/, /^https?:\/\/[^/]+\/[a-z]{2}\/?$/], urlOnly: true },
]

export function classifyPage(url: string, title = ''): PageType {
  const u = url.toLowerCase()
  const combined = `${u} ${title.toLowerCase()}`
  for (const rule of RULES) {
    const subject = rule.urlOnly ? u : combined
    if (rule.patterns.some((p) => p.test(subject))) return rule.type
  }
  return 'unknown'
}

export async function pageTypeOf(page: PageDriver): Promise<PageType> {
  let title = ''
  try { title = await page.title() } catch { /* title unavailable mid-navigation */ }
  return classifyPage(page.url(), title)
}

export function expectsProductGrid(type: PageType): boolean {
  return type === 'listing' || type === 'search_results'
}

export function expectsForm(type: PageType): boolean {
  return type === 'address_entry' || type === 'checkout' || type === 'payment'
}
