import os from 'os'
import path from 'path'
import { z } from 'zod'

export const RANKER_VARIANTS = ['legacy', 'production', 'fused'] as const
export type RankerVariant = (typeof RANKER_VARIANTS)[number]

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const envFlag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : !['0', 'false', 'no', 'off'].includes(v.trim().toLowerCase())))

const ConfigSchema = z.object({
  dataDir: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  headless: envFlag,
  browserTimeoutMs: z.coerce.number().int().positive(),
  actionTimeoutMs: z.coerce.number().int().positive(),
  elementTimeoutMs: z.coerce.number().int().positive(),
  maxRecoveryAttempts: z.coerce.number().int().min(0),
  maxCandidateTries: z.coerce.number().int().min(1),
  scanCap: z.coerce.number().int().positive(),
  rankerVariant: z.enum(RANKER_VARIANTS),
  embeddingModel: z.string().min(1),
  chatModel: z.string().min(1),
  openaiApiKey: z.string().min(1).optional(),
  embeddingCacheSize: z.coerce.number().int().positive(),
  fragmentsEnabled: envFlag,
  fragmentMinLength: z.coerce.number().int().min(2),
  fragmentTtlDays: z.coerce.number().positive().optional(),
  traceEnabled: envFlag,
  visionEnabled: envFlag,
})

export type EngineConfig = z.infer<typeof ConfigSchema>
export type ConfigOverrides = Partial<z.input<typeof ConfigSchema>>

/**
 * Explicit overrides win over SUREFOOT_* environment variables, which win over
 * defaults. Throws a ZodError naming the offending field when a value is invalid.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const emptyToUndefined = (v: string | undefined) => (v === undefined || v === '' ? undefined : v)

  return ConfigSchema.parse({
    dataDir: overrides.dataDir ?? emptyToUndefined(env.SUREFOOT_DATA_DIR) ?? path.join(os.homedir(), '.surefoot'),
    logLevel: overrides.logLevel ?? emptyToUndefined(env.SUREFOOT_LOG_LEVEL) ?? 'info',
    headless: overrides.headless ?? emptyToUndefined(env.SUREFOOT_HEADLESS) ?? true,
    browserTimeoutMs: overrides.browserTimeoutMs ?? emptyToUndefined(env.SUREFOOT_BROWSER_TIMEOUT) ?? 30000,
    actionTimeoutMs: overrides.actionTimeoutMs ?? emptyToUndefined(env.SUREFOOT_ACTION_TIMEOUT) ?? 5000,
    elementTimeoutMs: overrides.elementTimeoutMs ?? emptyToUndefined(env.SUREFOOT_ELEMENT_TIMEOUT) ?? 2000,
    maxRecoveryAttempts: overrides.maxRecoveryAttempts ?? emptyToUndefined(env.SUREFOOT_MAX_RECOVERY) ?? 2,
    maxCandidateTries: overrides.maxCandidateTries ?? emptyToUndefined(env.SUREFOOT_MAX_CANDIDATE_TRIES) ?? 3,
    scanCap: overrides.scanCap ?? emptyToUndefined(env.SUREFOOT_SCAN_CAP) ?? 200,
    rankerVariant: overrides.rankerVariant ?? emptyToUndefined(env.SUREFOOT_RANKER) ?? 'production',
    embeddingModel: overrides.embeddingModel ?? emptyToUndefined(env.SUREFOOT_EMBEDDING_MODEL) ?? 'text-embedding-3-small',
    chatModel: overrides.chatModel ?? emptyToUndefined(env.SUREFOOT_CHAT_MODEL) ?? 'gpt-4o-mini',
    openaiApiKey: overrides.openaiApiKey ?? emptyToUndefined(env.OPENAI_API_KEY),
    embeddingCacheSize: overrides.embeddingCacheSize ?? emptyToUndefined(env.SUREFOOT_EMBEDDING_CACHE) ?? 1000,
    fragmentsEnabled: overrides.fragmentsEnabled ?? emptyToUndefined(env.SUREFOOT_FRAGMENTS) ?? true,
    fragmentMinLength: overrides.fragmentMinLength ?? emptyToUndefined(env.SUREFOOT_FRAGMENT_MIN_LENGTH) ?? 2,
    fragmentTtlDays: overrides.fragmentTtlDays ?? emptyToUndefined(env.SUREFOOT_FRAGMENT_TTL_DAYS),
    traceEnabled: overrides.traceEnabled ?? emptyToUndefined(env.SUREFOOT_TRACE) ?? true,
    visionEnabled: overrides.visionEnabled ?? emptyToUndefined(env.SUREFOOT_VISION) ?? false,
  })
}

export function fragmentsFile(config: EngineConfig): string {
  return path.join(config.dataDir, 'fragments.json')
}

export function historyFile(config: EngineConfig): string {
  return path.join(config.dataDir, 'history.json')
}

export function traceDir(config: EngineConfig): string {
  return path.join(config.dataDir, 'traces')
}

export function profilesDir(config: EngineConfig): string {
  return path.join(config.dataDir, 'profiles')
}

export function screenshotsDir(config: EngineConfig): string {
  return path.join(config.dataDir, 'screenshots')
}
