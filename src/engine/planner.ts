import fs from 'fs'
import { z } from 'zod'
import { PlanError } from '../errors'
import type { Completion } from './llm'
import { ACTIONS, ExecutionStep } from './types'

export const ExecutionStepSchema = z.object({
  action: z.string().transform((a) => a.trim().toUpperCase()).pipe(z.enum(ACTIONS)),
  target: z.string(),
  value: z.union([z.string(), z.number()]).nullish().transform((v) => (v === null || v === undefined ? undefined : String(v))),
  region: z.string().nullish().transform((v) => v ?? undefined),
})

export const PlanSchema = z.preprocess(
  (raw) => (raw !== null && typeof raw === 'object' && !Array.isArray(raw) && 'steps' in raw ? raw.steps : raw),
  z.array(ExecutionStepSchema),
)

/** Validates planner output; a malformed plan is a PlanError naming the first bad field. */
export function parseSteps(raw: unknown): ExecutionStep[] {
  const parsed = PlanSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new PlanError(`invalid plan at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'unknown error'}`)
  }
  return parsed.data
}

export interface Planner {
  plan(instruction: string): Promise<ExecutionStep[]>
}

/** Returns the same steps whatever the instruction says. */
export class StaticPlanner implements Planner {
  constructor(private readonly steps: ExecutionStep[]) {}

  async plan(): Promise<ExecutionStep[]> {
    return this.steps.map((s) => ({ ...s }))
  }
}

/** Reads a plan file: either an array of steps or `{ "steps": [...] }`. */
export class JsonPlanner implements Planner {
  constructor(private readonly file: string) {}

  async plan(): Promise<ExecutionStep[]> {
    let text: string
    try {
      text = await fs.promises.readFile(this.file, 'utf8')
    } catch (err) {
      throw new PlanError(`cannot read plan ${this.file}: ${err instanceof Error ? err.message : String(err)}`)
    }
    try {
      return parseSteps(JSON.parse(text))
    } catch (err) {
      if (err instanceof PlanError) throw err
      throw new PlanError(`plan ${this.file} is not valid JSON`)
    }
  }
}

const PLANNER_PROMPT = `You turn a browser task into an ordered list of UI steps.
Actions: NAVIGATE (target = absolute URL), CLICK (target = visible text), TYPE (target = field label, value = text),
SELECT (target = field label, value = option), WAIT (target = seconds).
Reply with {"steps":[{"action":"...","target":"...","value":"..."}]}.`

export class OpenAIPlanner implements Planner {
  constructor(private readonly complete: Completion) {}

  async plan(instruction: string): Promise<ExecutionStep[]> {
    const text = await this.complete(PLANNER_PROMPT, instruction)
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch {
      throw new PlanError('planner returned malformed JSON')
    }
    return parseSteps(raw)
  }
}
