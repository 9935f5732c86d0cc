import { TraceLogger, actionId, runId } from '../audit/logger'
import type { PageSession } from '../browser/session'
import { PageDriver, isBlankUrl } from '../driver/types'
import { InitializationError, PlanError, errorMessage } from '../errors'
import { effectiveStartUrl } from '../flow/fragment-matcher'
import type { FragmentStore } from '../flow/fragment-store'
import type { FlowOptimizer, Optimization } from '../flow/optimizer'
import { RunChain, recordFragments } from '../flow/recorder'
import type { Logger } from '../logger'
import type { ElementLocator } from '../resolution/locator'
import type { StepResolver } from '../resolution/resolvers'
import type { SnapshotExtractor } from '../snapshot/extractor'
import { primaryText } from '../snapshot/types'
import { StateTracker, capture, isErrorState, validTransition } from '../state/fingerprint'
import { waitForPageReady } from '../state/readiness'
import { ActionExecutor } from './executor'
import { Planner, StaticPlanner, parseSteps } from './planner'
import type { RecoveryAdvisor, RecoverySuggestion } from './recovery'
import type { ActionResult, ExecutionStep, PhaseTransition, RunReport } from './types'

export type Phase = 'INITIALIZE' | 'PLAN' | 'EXECUTE' | 'VALIDATE' | 'RECOVER' | 'CLEANUP' | 'DONE'

export interface RunStateMachineDeps {
  session: PageSession
  planner: Planner
  locator: ElementLocator
  extractor: SnapshotExtractor
  advisor: RecoveryAdvisor
  logger: Logger
  optimizer?: FlowOptimizer | null
  store?: FragmentStore | null
  trace?: TraceLogger | null
  resolvers?: StepResolver[]
}

export interface RunOptions {
  maxRecoveryAttempts?: number
  actionTimeoutMs?: number
  navigationTimeoutMs?: number
  readyTimeoutMs?: number
  settleMs?: number
  fragmentMinLength?: number
  recordFragments?: boolean
  /** Upper bound for a wait suggested during recovery. */
  maxRecoveryWaitSeconds?: number
  /** Transitions kept in the report. */
  traceLimit?: number
}

const AVAILABLE_TEXTS = 50

/**
 * Drives one run: INITIALIZE → PLAN → EXECUTE → VALIDATE →
 * {RECOVER → EXECUTE | EXECUTE | CLEANUP} → DONE. The returned report is the
 * only outcome; faults inside any phase end up in `error`.
 */
export class RunStateMachine {
  private readonly opts: Required<RunOptions>

  constructor(private readonly deps: RunStateMachineDeps, opts: RunOptions = {}) {
    this.opts = {
      maxRecoveryAttempts: opts.maxRecoveryAttempts ?? 2,
      actionTimeoutMs: opts.actionTimeoutMs ?? 5000,
      navigationTimeoutMs: opts.navigationTimeoutMs ?? 30000,
      readyTimeoutMs: opts.readyTimeoutMs ?? 8000,
      settleMs: opts.settleMs ?? 1000,
      fragmentMinLength: opts.fragmentMinLength ?? 2,
      recordFragments: opts.recordFragments ?? true,
      maxRecoveryWaitSeconds: opts.maxRecoveryWaitSeconds ?? 10,
      traceLimit: opts.traceLimit ?? 500,
    }
  }

  /** Runs a plan, either from the configured planner or the given steps. */
  async run(instruction: string | ExecutionStep[]): Promise<RunReport> {
    return new RunContext(this.deps, this.opts).run(instruction)
  }
}

// ---------------------------------------------------------------------------
// Per-run state
// ---------------------------------------------------------------------------

class RunContext {
  private readonly id = runId()
  private readonly logger: Logger
  private readonly tracker = new StateTracker()
  private readonly executor: ActionExecutor
  private readonly transitions: PhaseTransition[] = []
  private phase: Phase = 'INITIALIZE'

  private page: PageDriver | null = null
  private steps: ExecutionStep[] = []
  private results: ActionResult[] = []
  private cursor = 0
  private recoveryAttempts = 0
  private error: string | null = null
  private fragmentsSaved = 0
  private fragmentReuse = 0
  private shortcuts = 0
  private readonly chain: RunChain = { steps: [], startUrl: null, stepEndUrls: [] }

  constructor(private readonly deps: RunStateMachineDeps, private readonly opts: Required<RunOptions>) {
    this.logger = deps.logger.child({ run: this.id })
    this.executor = new ActionExecutor(deps.locator, this.logger, this.tracker, deps.trace ?? null, {
      actionTimeoutMs: opts.actionTimeoutMs,
      navigationTimeoutMs: opts.navigationTimeoutMs,
      readyTimeoutMs: opts.readyTimeoutMs,
      settleMs: opts.settleMs,
      resolvers: deps.resolvers,
    })
  }

  async run(instruction: string | ExecutionStep[]): Promise<RunReport> {
    const t0 = Date.now()
    this.logger.info('run started')

    try {
      const page = await this.initialize()
      if (page && (await this.plan(instruction))) {
        await this.execute(page)
      }
    } catch (err) {
      this.error = `run aborted at step ${this.cursor}: ${errorMessage(err)}`
      this.logger.error({ step: this.cursor, err: errorMessage(err) }, 'run aborted')
    }
    await this.cleanup()

    const report = this.report()
    this.logger.info(
      { success: report.success, executed: report.steps_executed, total: report.total_steps, error: report.error, duration_ms: Date.now() - t0 },
      'run finished',
    )
    this.deps.trace?.write({
      run_id: this.id,
      action_id: actionId(),
      type: 'run',
      result: {
        success: report.success,
        steps_executed: report.steps_executed,
        total_steps: report.total_steps,
        skipped_steps: report.skipped_steps,
        fragments_saved: report.fragments_saved,
        duration_ms: Date.now() - t0,
      },
      error: report.error,
    })
    return report
  }

  // -- phases --------------------------------------------------------------

  private async initialize(): Promise<PageDriver | null> {
    try {
      this.page = await this.deps.session.acquire()
      return this.page
    } catch (err) {
      this.error = new InitializationError(`browser session could not start: ${errorMessage(err)}`).message
      this.logger.error({ err: errorMessage(err) }, 'initialization failed')
      return null
    }
  }

  private async plan(instruction: string | ExecutionStep[]): Promise<boolean> {
    this.enter('PLAN')
    try {
      const raw = typeof instruction === 'string'
        ? await this.deps.planner.plan(instruction)
        : await new StaticPlanner(instruction).plan()
      this.steps = parseSteps(raw)
      this.logger.info({ steps: this.steps.length }, 'plan ready')
      return true
    } catch (err) {
      const e = err instanceof PlanError ? err : new PlanError(`planning failed: ${errorMessage(err)}`)
      this.error = e.message
      this.logger.error({ err: e.message }, 'planning failed')
      return false
    }
  }

  private async execute(page: PageDriver): Promise<void> {
    // Each step may take at most 1 + maxRecoveryAttempts executions.
    const maxIterations = this.steps.length * (this.opts.maxRecoveryAttempts + 2) + 10
    let iterations = 0

    while (this.cursor < this.steps.length) {
      if (++iterations > maxIterations) {
        this.error = `iteration limit reached at step ${this.cursor}`
        this.logger.error({ step: this.cursor }, 'iteration limit reached')
        return
      }
      this.enter('EXECUTE', this.cursor)
      if (this.cursor === 0 && this.chain.startUrl === null) {
        this.chain.startUrl = effectiveStartUrl(page.url(), this.steps[0])
      }

      const result = (await this.shortcut(page)) ?? (await this.executor.execute(page, this.steps[this.cursor], { stepIndex: this.cursor, runId: this.id }))

      this.enter('VALIDATE', this.cursor, result.success ? undefined : result.error)
      this.store(result)

      if (result.success) {
        this.advance(result, page.url())
        continue
      }

      if (result.errorKind === 'navigation') {
        this.error = result.error ?? 'navigation failed'
        return
      }
      if (this.recoveryAttempts >= this.opts.maxRecoveryAttempts) {
        this.error = `exhausted recovery (${this.recoveryAttempts} attempts) at step ${this.cursor}: ${result.error ?? 'unknown error'}`
        this.logger.error({ step: this.cursor, attempts: this.recoveryAttempts }, 'exhausted recovery')
        return
      }
      await this.recover(page, result)
    }
  }

  private async shortcut(page: PageDriver): Promise<ActionResult | null> {
    if (!this.deps.optimizer) return null
    const opt = await this.deps.optimizer.optimize(page, this.steps.slice(this.cursor))
    if (!opt) return null

    const step = this.steps[this.cursor]
    const t0 = Date.now()
    const before = await capture(page)
    try {
      await page.goto(opt.url, { timeoutMs: this.opts.navigationTimeoutMs, waitUntil: 'domcontentloaded' })
      await waitForPageReady(page, this.logger, this.opts.readyTimeoutMs)
    } catch (err) {
      // Fall back to resolving the step normally.
      this.logger.warn({ type: opt.type, url: opt.url, err: errorMessage(err) }, 'shortcut navigation failed')
      return null
    }
    const after = await capture(page)
    if (isErrorState(after) || !validTransition(before, after)) {
      this.logger.warn({ type: opt.type, url: opt.url, title: after.title }, 'shortcut rejected')
      await this.returnTo(page, before.url)
      return null
    }
    this.tracker.record(before, after, opt.type)
    await this.noteOptimization(opt)

    return {
      success: true,
      action: step.action,
      target: step.target,
      stepIndex: this.cursor,
      via: opt.type,
      before,
      after,
      attempts: 1,
      tries: 0,
      skipped: opt.skip,
      durationMs: Date.now() - t0,
    }
  }

  private async returnTo(page: PageDriver, url: string): Promise<void> {
    if (isBlankUrl(url) || page.url() === url) return
    try {
      await page.goto(url, { timeoutMs: this.opts.navigationTimeoutMs, waitUntil: 'domcontentloaded' })
      await waitForPageReady(page, this.logger, this.opts.readyTimeoutMs)
    } catch (err) {
      this.logger.warn({ url, err: errorMessage(err) }, 'return after shortcut failed')
    }
  }

  private async noteOptimization(opt: Optimization): Promise<void> {
    this.logger.info({ type: opt.type, url: opt.url, skip: opt.skip }, 'flow shortcut taken')
    this.deps.trace?.write({
      run_id: this.id,
      action_id: actionId(),
      type: 'optimization',
      url: opt.url,
      params: { kind: opt.type, skip: opt.skip, fragment_id: opt.type === 'fragment' ? opt.fragmentId : null },
    })
    if (opt.type === 'fragment') {
      this.fragmentReuse++
      if (this.deps.store) {
        await this.deps.store.touch(opt.fragmentId).catch((err: unknown) => {
          this.logger.warn({ id: opt.fragmentId, err: errorMessage(err) }, 'fragment touch failed')
        })
      }
    } else {
      this.shortcuts++
    }
  }

  private async recover(page: PageDriver, failed: ActionResult): Promise<void> {
    this.enter('RECOVER', this.cursor, failed.error)
    this.recoveryAttempts++
    const step = this.steps[this.cursor]

    let texts: string[] = []
    try {
      const candidates = await this.deps.extractor.scan(page, 'clickable', { scrollForLazy: false })
      texts = candidates.slice(0, AVAILABLE_TEXTS).map(primaryText).filter(Boolean)
    } catch (err) {
      this.logger.debug({ err: errorMessage(err) }, 'recovery scan failed')
    }

    let title = ''
    try { title = await page.title() } catch { /* mid-navigation */ }
    let suggestions: RecoverySuggestion[] = []
    try {
      suggestions = await this.deps.advisor.suggestRecovery(step.action, step.target, failed.error ?? '', texts, { url: page.url(), title })
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'recovery advisor failed')
    }

    const first = suggestions[0]
    this.deps.trace?.write({
      run_id: this.id,
      action_id: actionId(),
      type: 'recovery',
      action: step.action,
      url: page.url(),
      target: step.target,
      params: { attempt: this.recoveryAttempts },
      result: { suggestion: first ?? null },
      error: failed.error ?? null,
    })
    if (!first) {
      this.logger.info({ step: this.cursor, attempt: this.recoveryAttempts }, 'no recovery suggestion, retrying')
      return
    }

    if (first.alternativeTarget && first.alternativeTarget.trim() && first.alternativeTarget !== step.target) {
      this.logger.info({ step: this.cursor, from: step.target, to: first.alternativeTarget }, 'retrying with alternative target')
      this.steps[this.cursor] = { ...step, target: first.alternativeTarget.trim() }
    }
    if (first.waitTimeSeconds && first.waitTimeSeconds > 0) {
      const seconds = Math.min(first.waitTimeSeconds, this.opts.maxRecoveryWaitSeconds)
      try {
        await page.waitForTimeout(seconds * 1000)
      } catch (err) {
        this.logger.warn({ seconds, err: errorMessage(err) }, 'recovery wait failed')
      }
    }
  }

  private async cleanup(): Promise<void> {
    this.enter('CLEANUP', this.cursor)
    if (this.deps.store && this.opts.recordFragments && this.cursor > 0) {
      this.chain.steps = this.steps.slice(0, this.cursor)
      try {
        this.fragmentsSaved = await recordFragments(this.deps.store, this.chain, this.logger, { minLength: this.opts.fragmentMinLength })
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'fragment recording failed')
      }
    }
    if (this.page) {
      this.page = null
      try {
        await this.deps.session.release()
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'session release failed')
      }
    }
    this.enter('DONE', this.cursor)
  }

  // -- bookkeeping ---------------------------------------------------------

  /** One result per step; a retry replaces the previous one and counts the attempt. */
  private store(result: ActionResult): void {
    const i = this.results.findIndex((r) => r.stepIndex === result.stepIndex)
    if (i === -1) {
      this.results.push(result)
      return
    }
    this.results[i] = { ...result, attempts: this.results[i].attempts + 1 }
  }

  private advance(result: ActionResult, urlAfter: string): void {
    const skip = Math.max(1, result.skipped)
    for (let k = 0; k < skip; k++) {
      this.chain.stepEndUrls[this.cursor + k] = k === skip - 1 ? urlAfter : null
    }
    this.cursor += skip
    this.recoveryAttempts = 0
  }

  private enter(to: Phase, stepIndex = this.cursor, detail?: string): void {
    this.transitions.push({ ts: new Date().toISOString(), from: this.phase, to, stepIndex, detail })
    if (this.transitions.length > this.opts.traceLimit) this.transitions.shift()
    this.logger.debug({ from: this.phase, to, step: stepIndex }, 'phase')
    this.phase = to
  }

  private report(): RunReport {
    const total = this.steps.length
    const everyResultOk = this.results.every((r) => r.success)
    const success = this.error === null && (total === 0 || (everyResultOk && this.cursor >= total))
    return {
      success,
      steps_executed: this.cursor,
      total_steps: total,
      skipped_steps: this.results.filter((r) => r.via === 'fragment' || r.via === 'url_shortcut' || r.via === 'state_shortcut').reduce((n, r) => n + r.skipped, 0),
      results: this.results,
      steps: this.steps,
      error: this.error,
      fragments_saved: this.fragmentsSaved,
      fragment_reuse_count: this.fragmentReuse,
      shortcut_count: this.shortcuts,
      trace: this.transitions,
      state_transitions: this.tracker.list(),
    }
  }
}
