import { TraceLogger, actionId } from '../audit/logger'
import type { PageDriver } from '../driver/types'
import { SurefootError, ValidationError, collectDiagnostics, errorKind, errorMessage } from '../errors'
import { stripSlash } from '../flow/fragment-matcher'
import type { Logger } from '../logger'
import type { ElementLocator } from '../resolution/locator'
import { Resolution, ResolverContext, StepResolver, defaultResolvers } from '../resolution/resolvers'
import { PageState, StateTracker, capture, isErrorState, validNavigation, validTransition } from '../state/fingerprint'
import { pageTypeOf } from '../state/page-type'
import type { ActionResult, ExecutionStep } from './types'

export interface ExecutorOptions {
  actionTimeoutMs?: number
  navigationTimeoutMs?: number
  readyTimeoutMs?: number
  settleMs?: number
  resolvers?: StepResolver[]
}

export interface ExecuteContext {
  stepIndex: number
  runId?: string
}

/** A NAVIGATE is effective if the address changed or already is the target. */
export function navigationReached(step: ExecutionStep, before: PageState, after: PageState): boolean {
  return validNavigation(before, after) || stripSlash(after.url) === stripSlash(step.target.trim())
}

/**
 * Executes one step: capture, first applicable resolver, capture again, then
 * validate that the step had an observable effect. Never throws; failures
 * come back as an unsuccessful ActionResult.
 */
export class ActionExecutor {
  private readonly resolvers: StepResolver[]

  constructor(
    private readonly locator: ElementLocator,
    private readonly logger: Logger,
    private readonly tracker: StateTracker,
    private readonly trace: TraceLogger | null,
    private readonly opts: ExecutorOptions = {},
  ) {
    this.resolvers = opts.resolvers ?? defaultResolvers()
  }

  async execute(page: PageDriver, step: ExecutionStep, ctx: ExecuteContext): Promise<ActionResult> {
    const id = actionId()
    const t0 = Date.now()
    const base = { action: step.action, target: step.target, stepIndex: ctx.stepIndex, attempts: 1, skipped: 1 }
    let before: PageState | undefined

    try {
      before = await capture(page)
      const rctx: ResolverContext = {
        page,
        step,
        pageType: await pageTypeOf(page),
        locator: this.locator,
        logger: this.logger,
        actionTimeoutMs: this.opts.actionTimeoutMs ?? 5000,
        navigationTimeoutMs: this.opts.navigationTimeoutMs ?? 30000,
        readyTimeoutMs: this.opts.readyTimeoutMs ?? 8000,
        settleMs: this.opts.settleMs ?? 1000,
      }

      let via = ''
      let resolution: Resolution | null = null
      for (const resolver of this.resolvers) {
        if (!resolver.applies(rctx)) continue
        resolution = await resolver.resolve(rctx)
        if (resolution) {
          via = resolver.name
          break
        }
        this.logger.debug({ resolver: resolver.name, target: step.target }, 'resolver declined')
      }
      if (!resolution) throw new SurefootError('resolution', `no resolver handled ${step.action} "${step.target}"`)

      const after = await capture(page)
      const valid =
        step.action === 'NAVIGATE' ? navigationReached(step, before, after)
          : step.action === 'WAIT' ? true
            : validTransition(before, after)
      if (!valid) throw new ValidationError(`${step.action} "${step.target}" had no observable effect`)

      this.tracker.record(before, after, step.action)
      if (resolution.candidate) this.locator.ranker.recordSuccess(step.action, resolution.candidate)
      if (isErrorState(after)) this.logger.warn({ url: after.url, title: after.title }, 'landed on an error page')

      const result: ActionResult = {
        ...base,
        success: true,
        element: resolution.element,
        via,
        before,
        after,
        tries: resolution.tries,
        durationMs: Date.now() - t0,
      }
      this.write(id, ctx, step, page.url(), result)
      return result
    } catch (err) {
      const diagnostics = await collectDiagnostics(page, t0, err)
      const result: ActionResult = {
        ...base,
        success: false,
        before,
        error: errorMessage(err),
        errorKind: errorKind(err),
        tries: 0,
        durationMs: diagnostics.elapsedMs,
      }
      this.logger.warn({ step: ctx.stepIndex, action: step.action, target: step.target, kind: result.errorKind, url: diagnostics.url, err: result.error }, 'step failed')
      this.write(id, ctx, step, diagnostics.url, result)
      return result
    }
  }

  private write(id: string, ctx: ExecuteContext, step: ExecutionStep, url: string, result: ActionResult): void {
    this.trace?.write({
      run_id: ctx.runId,
      action_id: id,
      type: 'action',
      action: step.action,
      url,
      target: step.target,
      // typed values may be credentials
      params: { value: step.action === 'TYPE' ? '[REDACTED]' : step.value ?? null, region: step.region ?? null },
      result: {
        success: result.success,
        via: result.via ?? null,
        element: result.element ?? null,
        tries: result.tries,
        duration_ms: result.durationMs,
      },
      error: result.error ?? null,
    })
  }
}
