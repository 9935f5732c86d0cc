export interface Box {
  x: number
  y: number
  width: number
  height: number
}

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle'

export interface ActionOptions {
  timeoutMs: number
}

/**
 * One live DOM node. Handles are only meaningful for the page state they were
 * found on; after navigation every method may throw or report not-visible.
 */
export interface ElementRef {
  tagName(): Promise<string>
  isVisible(): Promise<boolean>
  isEnabled(): Promise<boolean>
  isChecked(): Promise<boolean>
  innerText(): Promise<string>
  inputValue(): Promise<string>
  getAttribute(name: string): Promise<string | null>
  boundingBox(): Promise<Box | null>

  locateAll(selector: string): Promise<ElementRef[]>
  parent(): Promise<ElementRef | null>
  nextSibling(): Promise<ElementRef | null>
  /** Nearest ancestor with the given tag name, e.g. `label`. */
  ancestor(tag: string): Promise<ElementRef | null>

  click(opts: ActionOptions): Promise<void>
  fill(value: string, opts: ActionOptions): Promise<void>
  press(key: string, opts: ActionOptions): Promise<void>
  selectOption(label: string, opts: ActionOptions): Promise<void>
  check(opts: ActionOptions): Promise<void>
  scrollIntoView(): Promise<void>
}

export interface ScrollMetrics {
  y: number
  height: number
  viewport: number
}

/** The capability object the engine needs from a browser page. */
export interface PageDriver {
  url(): string
  title(): Promise<string>
  locateAll(selector: string): Promise<ElementRef[]>
  goto(url: string, opts?: { timeoutMs?: number; waitUntil?: LoadState }): Promise<void>
  /** Serialized markup plus live form-control state (values, checked, selected). */
  contentSnapshot(): Promise<string>
  scrollMetrics(): Promise<ScrollMetrics>
  scrollTo(y: number): Promise<void>
  screenshot(): Promise<Buffer>
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>
  waitForTimeout(ms: number): Promise<void>
}

export const BLANK_URLS = new Set(['', 'about:blank', 'chrome://newtab/'])

export function isBlankUrl(url: string): boolean {
  return BLANK_URLS.has(url)
}
