import type { ErrorKind } from '../errors'
import type { ElementDescriptor } from '../snapshot/types'
import type { PageState } from '../state/fingerprint'

export const ACTIONS = ['NAVIGATE', 'CLICK', 'TYPE', 'SELECT', 'WAIT'] as const
export type ActionKind = (typeof ACTIONS)[number]

export interface ExecutionStep {
  action: ActionKind
  target: string
  value?: string
  /** Optional region hint: header, sidebar, product grid, main. */
  region?: string
}

export interface ActionResult {
  success: boolean
  action: ActionKind
  target: string
  /** Index of the first step this result covers. */
  stepIndex: number
  element?: ElementDescriptor
  /** Resolver that handled the step, or the shortcut tier that skipped it. */
  via?: string
  before?: PageState
  after?: PageState
  error?: string
  errorKind?: ErrorKind
  /** Executions of this step, recovery retries included. */
  attempts: number
  /** Ranked handles tried in the last execution. */
  tries: number
  /** Steps this result accounts for; more than one when a shortcut skipped ahead. */
  skipped: number
  durationMs: number
}

export interface PhaseTransition {
  ts: string
  from: string
  to: string
  stepIndex: number
  detail?: string
}

export interface RunReport {
  success: boolean
  steps_executed: number
  total_steps: number
  skipped_steps: number
  results: ActionResult[]
  steps: ExecutionStep[]
  error: string | null
  fragments_saved: number
  fragment_reuse_count: number
  shortcut_count: number
  trace: PhaseTransition[]
  state_transitions: Array<{ from: string; to: string; action: string; changed: boolean }>
}
