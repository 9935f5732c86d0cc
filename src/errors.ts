import type { PageDriver } from './driver/types'

export type ErrorKind =
  | 'resolution'
  | 'action'
  | 'validation'
  | 'navigation'
  | 'initialization'
  | 'plan'
  | 'exhausted_recovery'

// ---------------------------------------------------------------------------
// Structured diagnostics attached to failures raised while a page is live
// ---------------------------------------------------------------------------

export interface Diagnostics {
  error: string
  url: string
  title: string
  elapsedMs: number
  stack?: string
}

export class SurefootError extends Error {
  readonly kind: ErrorKind
  readonly diagnostics?: Diagnostics

  constructor(kind: ErrorKind, message: string, diagnostics?: Diagnostics) {
    super(message)
    this.name = 'SurefootError'
    this.kind = kind
    this.diagnostics = diagnostics
  }
}

/** No candidate cleared any threshold tier, and self-healing found nothing. */
export class ResolutionError extends SurefootError {
  readonly target: string
  readonly bestScore: number
  constructor(target: string, bestScore: number, diagnostics?: Diagnostics) {
    super('resolution', `could not resolve "${target}" (best score ${bestScore.toFixed(2)})`, diagnostics)
    this.name = 'ResolutionError'
    this.target = target
    this.bestScore = bestScore
  }
}

/** A handle was found but the interaction itself threw or timed out. */
export class ActionError extends SurefootError {
  constructor(message: string, diagnostics?: Diagnostics) {
    super('action', message, diagnostics)
    this.name = 'ActionError'
  }
}

export class ValidationError extends SurefootError {
  constructor(message: string, diagnostics?: Diagnostics) {
    super('validation', message, diagnostics)
    this.name = 'ValidationError'
  }
}

export class NavigationError extends SurefootError {
  constructor(message: string, diagnostics?: Diagnostics) {
    super('navigation', message, diagnostics)
    this.name = 'NavigationError'
  }
}

export class InitializationError extends SurefootError {
  constructor(message: string) {
    super('initialization', message)
    this.name = 'InitializationError'
  }
}

export class PlanError extends SurefootError {
  constructor(message: string) {
    super('plan', message)
    this.name = 'PlanError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function errorKind(err: unknown, fallback: ErrorKind = 'action'): ErrorKind {
  return err instanceof SurefootError ? err.kind : fallback
}

export async function collectDiagnostics(page: PageDriver, t0: number, err: unknown): Promise<Diagnostics> {
  const e = err instanceof Error ? err : new Error(String(err))
  let title = ''
  try { title = await page.title() } catch { /* page may be closed */ }
  return { error: e.message, url: page.url(), title, elapsedMs: Date.now() - t0, stack: e.stack }
}
