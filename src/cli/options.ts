import { Command } from 'commander'
import { ConfigOverrides, EngineConfig, LOG_LEVELS, LogLevel, RANKER_VARIANTS, RankerVariant, resolveConfig } from '../config'
import { createLogger, Logger } from '../logger'

export interface GlobalOptions {
  dataDir?: string
  logLevel?: LogLevel
}

function isVariant(v: string): v is RankerVariant {
  return RANKER_VARIANTS.some((r) => r === v)
}

export function parseVariant(v: string): RankerVariant {
  if (!isVariant(v)) throw new Error(`unknown ranker "${v}" (expected ${RANKER_VARIANTS.join(', ')})`)
  return v
}

function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v)
}

export function parseLogLevel(v: string): LogLevel {
  if (!isLogLevel(v)) throw new Error(`unknown log level "${v}" (expected ${LOG_LEVELS.join(', ')})`)
  return v
}

export function parseCount(v: string): number {
  const n = Number(v)
  if (!Number.isFinite(n) || n < 0) throw new Error(`expected a non-negative number, got "${v}"`)
  return n
}

/** Root options merged with a command's own overrides, then env, then defaults. */
export function loadConfig(cmd: Command, overrides: ConfigOverrides = {}): { config: EngineConfig; logger: Logger } {
  const global = cmd.optsWithGlobals<GlobalOptions>()
  const config = resolveConfig({
    ...overrides,
    ...(global.dataDir ? { dataDir: global.dataDir } : {}),
    ...(global.logLevel ? { logLevel: global.logLevel } : {}),
  })
  return { config, logger: createLogger(config.logLevel) }
}
