export interface PlannedStep {
  action: string
  target: string
  value?: string | null
}

/** A deduplicated step and how many raw steps it stands for. */
export interface DedupedStep<S extends PlannedStep = PlannedStep> {
  step: S | PlannedStep
  span: number
}

export function parseWaitSeconds(step: PlannedStep): number {
  for (const raw of [step.value, step.target]) {
    if (!raw) continue
    const m = /(\d+(?:\.\d+)?)\s*(?:s|sec|second)?/i.exec(String(raw))
    if (m) return Number(m[1])
  }
  return 0
}

/**
 * Consecutive WAITs are summed into one, zero-length waits dropped, and
 * consecutive CLICKs on the same target collapse to the first. Dropped raw
 * steps are folded into a neighbour's span so skip counts stay in raw steps.
 */
export function dedupSteps<S extends PlannedStep>(steps: S[]): DedupedStep<S>[] {
  const out: DedupedStep<S>[] = []
  let pending = 0
  let i = 0
  while (i < steps.length) {
    const s = steps[i]
    const action = s.action.toUpperCase()

    if (action === 'WAIT') {
      let total = parseWaitSeconds(s)
      let j = i + 1
      while (j < steps.length && steps[j].action.toUpperCase() === 'WAIT') {
        total += parseWaitSeconds(steps[j])
        j++
      }
      const span = j - i
      if (total > 0) {
        out.push({ step: { action: 'WAIT', target: String(total), value: String(total) }, span: span + pending })
        pending = 0
      } else {
        pending += span
      }
      i = j
      continue
    }

    const prev = out[out.length - 1]
    if (
      action === 'CLICK' &&
      prev &&
      prev.step.action.toUpperCase() === 'CLICK' &&
      prev.step.target.trim() === s.target.trim()
    ) {
      prev.span += 1 + pending
      pending = 0
      i++
      continue
    }

    out.push({ step: s, span: 1 + pending })
    pending = 0
    i++
  }
  const last = out[out.length - 1]
  if (pending > 0 && last) last.span += pending
  return out
}

export function deduplicateSteps<S extends PlannedStep>(steps: S[]): Array<S | PlannedStep> {
  return dedupSteps(steps).map((d) => d.step)
}
