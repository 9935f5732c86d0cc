import { z } from 'zod'
import { PAGE_TYPES, PageType } from '../state/page-type'
import defaults from './default-shortcuts.json'
import { siteOf } from './recorder'

const UrlShortcutSchema = z.object({
  phrase: z.string().min(1),
  path: z.string().min(1),
  /** Host the entry belongs to, without www; subdomains match too. Absent means any site. */
  site: z.string().min(1).optional(),
})
const StateShortcutSchema = UrlShortcutSchema.extend({ pageType: z.enum(PAGE_TYPES) })

export const ShortcutTableSchema = z.object({
  url: z.array(UrlShortcutSchema).default([]),
  state: z.array(StateShortcutSchema).default([]),
})

export type UrlShortcut = z.infer<typeof UrlShortcutSchema>
export type StateShortcut = z.infer<typeof StateShortcutSchema>
export type ShortcutTable = z.infer<typeof ShortcutTableSchema>

export function defaultShortcuts(): ShortcutTable {
  return ShortcutTableSchema.parse(defaults)
}

/** Scheme and host of an http(s) URL, or null for blank and non-web pages. */
export function siteOrigin(url: string): string | null {
  try {
    const u = new URL(url)
    return u.protocol === 'http:' || u.protocol === 'https:' ? u.origin : null
  } catch {
    return null
  }
}

const phraseIn = (target: string, phrase: string) => target.trim().toLowerCase().includes(phrase.toLowerCase())

function onSite(entry: UrlShortcut, baseUrl: string): boolean {
  if (!entry.site) return true
  const site = siteOf(baseUrl)
  const wanted = entry.site.toLowerCase()
  return site === wanted || site.endsWith('.' + wanted)
}

/** Target phrase → path on the current site; first entry in table order wins. */
export class UrlShortcutRegistry {
  constructor(private readonly entries: UrlShortcut[] = defaultShortcuts().url) {}

  resolve(baseUrl: string, target: string): string | null {
    const origin = siteOrigin(baseUrl)
    if (!origin || !target) return null
    const hit = this.entries.find((e) => onSite(e, baseUrl) && phraseIn(target, e.phrase))
    return hit ? origin + hit.path : null
  }
}

/** (classified page type, target phrase) → path on the current site. */
export class StateShortcutRegistry {
  constructor(private readonly entries: StateShortcut[] = defaultShortcuts().state) {}

  resolve(baseUrl: string, pageType: PageType, target: string): string | null {
    const origin = siteOrigin(baseUrl)
    if (!origin || !target) return null
    const hit = this.entries.find((e) => e.pageType === pageType && onSite(e, baseUrl) && phraseIn(target, e.phrase))
    return hit ? origin + hit.path : null
  }
}
