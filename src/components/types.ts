import type { ElementRef, PageDriver } from '../driver/types'
import type { ElementCandidate } from '../snapshot/types'

export const COMPONENT_KINDS = [
  'product_card',
  'form_input',
  'button',
  'nav_item',
  'modal',
  'radio_option',
  'checkbox',
] as const

export type ComponentKind = (typeof COMPONENT_KINDS)[number]

export interface ComponentSlots {
  /** First line of a card, capped. */
  primaryText?: string
  /** Resolved label for inputs, radios and checkboxes. */
  label?: string
  href?: string
  checked?: boolean
}

/**
 * A candidate tagged with its structural kind. `action` is the node an
 * interaction goes to (a product card's anchor, a radio's visible label);
 * it is visible and attached when the component is built.
 */
export interface SemanticComponent extends ElementCandidate {
  kind: ComponentKind
  action: ElementRef
  slots: ComponentSlots
}

export type ComponentExtractor = (page: PageDriver) => Promise<SemanticComponent[]>
