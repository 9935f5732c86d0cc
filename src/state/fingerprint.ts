import crypto from 'crypto'
import type { PageDriver } from '../driver/types'

export interface PageState {
  url: string
  title: string
  /** Hash of markup plus live form-control state. */
  fingerprint: string
  capturedAt: string
}

export function fingerprintOf(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').slice(0, 32)
}

export async function capture(page: PageDriver): Promise<PageState> {
  const url = page.url()
  let title = ''
  let content = ''
  try { title = await page.title() } catch { /* mid-navigation */ }
  try { content = await page.contentSnapshot() } catch { /* page closed or navigating; hash of nothing */ }
  return { url, title, fingerprint: fingerprintOf(content), capturedAt: new Date().toISOString() }
}

export function sameState(a: PageState, b: PageState): boolean {
  return a.url === b.url && a.fingerprint === b.fingerprint
}

/** Some observable effect: the address or the content changed. */
export function validTransition(before: PageState, after: PageState): boolean {
  return before.url !== after.url || before.fingerprint !== after.fingerprint
}

export function validNavigation(before: PageState, after: PageState): boolean {
  return before.url !== after.url
}

const ERROR_MARKERS = [/\berror\b/, /\b404\b/, /not found/, /forbidden/, /unauthori[sz]ed/, /access denied/]

export function isErrorState(state: PageState): boolean {
  const subject = `${state.title} ${state.url}`.toLowerCase()
  return ERROR_MARKERS.some((m) => m.test(subject))
}

// ---------------------------------------------------------------------------
// Bounded transition history for the run report
// ---------------------------------------------------------------------------

export interface StateTransition {
  from: string
  to: string
  action: string
  changed: boolean
}

export class StateTracker {
  private readonly transitions: StateTransition[] = []

  constructor(private readonly max = 100) {}

  record(before: PageState, after: PageState, action: string): void {
    this.transitions.push({ from: before.url, to: after.url, action, changed: validTransition(before, after) })
    if (this.transitions.length > this.max) this.transitions.splice(0, this.transitions.length - this.max)
  }

  list(): StateTransition[] {
    return [...this.transitions]
  }
}
