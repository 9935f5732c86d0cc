import type { ElementRef, PageDriver } from '../driver/types'
import { cleanText, cssString } from '../snapshot/extractor'

/** The `<label>` element bound to a control: `label[for=id]`, else the wrapping label. */
export async function labelElement(page: PageDriver, control: ElementRef, id: string): Promise<ElementRef | null> {
  if (id) {
    const bound = await page.locateAll(`label[for="${cssString(id)}"]`)
    if (bound.length > 0) return bound[0]
  }
  return control.ancestor('label')
}

export async function labelText(page: PageDriver, control: ElementRef, id: string): Promise<string> {
  const label = await labelElement(page, control, id)
  return label ? cleanText(await label.innerText()) : ''
}

/** First non-empty value in order, trimmed. */
export function firstOf(...values: Array<string | null | undefined>): string {
  for (const v of values) {
    const t = (v ?? '').trim()
    if (t) return t
  }
  return ''
}

/** First non-empty line of a multi-line block of text. */
export function firstLine(text: string, max = 120): string {
  const line = text.split('\n').map((l) => l.trim()).find(Boolean) ?? ''
  return line.slice(0, max)
}
