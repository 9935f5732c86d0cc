import type { Box, ElementRef } from '../driver/types'
import { normalize, truncate } from '../ranking/text'

export type ScanKind = 'clickable' | 'input'

export interface CandidateAttributes {
  id: string
  className: string
  role: string
  type: string
  name: string
  href: string
  placeholder: string
  ariaLabel: string
  title: string
  value: string
  /** Resolved `<label>` text for form controls. */
  label: string
}

/**
 * One interactive element found on the page. Created fresh per resolution
 * attempt; a navigation invalidates the handle.
 */
export interface ElementCandidate {
  /** Position in the scan result, used as the document-order tie-break. */
  index: number
  tag: string
  text: string
  ancestorText: string
  attributes: CandidateAttributes
  /** Document coordinates (scroll offset already added). */
  box: Box | null
  visible: boolean
  handle: ElementRef
}

/** Serializable summary of the element an action ran against. */
export interface ElementDescriptor {
  tag: string
  text: string
  id: string
  kind?: string
  score?: number
}

export function emptyAttributes(): CandidateAttributes {
  return {
    id: '', className: '', role: '', type: '', name: '', href: '',
    placeholder: '', ariaLabel: '', title: '', value: '', label: '',
  }
}

/** Own text, then the accessible names a screen reader would announce. */
export function primaryText(c: ElementCandidate): string {
  return c.text || c.attributes.label || c.attributes.ariaLabel || c.attributes.placeholder || c.attributes.title || c.attributes.value
}

export function accessibleLabel(c: ElementCandidate): string {
  return c.attributes.label || c.attributes.ariaLabel || c.attributes.placeholder || c.attributes.title
}

export function combinedText(c: ElementCandidate): string {
  const a = c.attributes
  return normalize([c.text, c.ancestorText, a.placeholder, a.label, a.ariaLabel].filter(Boolean).join(' '))
}

export function describe(c: ElementCandidate, extra: Partial<ElementDescriptor> = {}): ElementDescriptor {
  return { tag: c.tag, text: truncate(primaryText(c), 80), id: c.attributes.id, ...extra }
}

export function historyKey(c: ElementCandidate): string {
  return `${c.tag}_${normalize(primaryText(c))}_${c.attributes.id}`
}
