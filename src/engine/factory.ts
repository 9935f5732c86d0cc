import { TraceLogger } from '../audit/logger'
import { BrowserSession, BrowserSessionOptions, PageSession } from '../browser/session'
import { defaultRegistry } from '../components/registry'
import { EngineConfig, fragmentsFile, historyFile, traceDir } from '../config'
import { FragmentMatcher } from '../flow/fragment-matcher'
import { FragmentStore } from '../flow/fragment-store'
import { FlowOptimizer } from '../flow/optimizer'
import { ShortcutTable, StateShortcutRegistry, UrlShortcutRegistry, defaultShortcuts } from '../flow/shortcuts'
import type { Logger } from '../logger'
import { SemanticScorer, TextEmbedder, createEmbedder } from '../ranking/embeddings'
import { HistoryStore } from '../ranking/history'
import { CandidateRanker } from '../ranking/ranker'
import { ModelScreenReader, ScreenReader } from '../ranking/vision'
import { strategyFor } from '../ranking/weights'
import { ElementLocator } from '../resolution/locator'
import type { StepResolver } from '../resolution/resolvers'
import { SelfHealingResolver } from '../resolution/self-healing'
import { SnapshotExtractor } from '../snapshot/extractor'
import { createCompletion, createImageCompletion } from './llm'
import { Planner, OpenAIPlanner, StaticPlanner } from './planner'
import { OpenAIRecoveryAdvisor, RecoveryAdvisor, TableRecoveryAdvisor } from './recovery'
import { RunStateMachine } from './state-machine'
import type { ExecutionStep, RunReport } from './types'

export interface EngineDeps {
  session?: PageSession
  sessionOptions?: BrowserSessionOptions
  planner?: Planner
  advisor?: RecoveryAdvisor
  /** `null` disables embeddings even when an API key is configured. */
  embedder?: TextEmbedder | null
  shortcuts?: ShortcutTable
  /** `null` disables the screen-reading pass even when it is configured. */
  screenReader?: ScreenReader | null
  resolvers?: StepResolver[]
  /** Persist success history between runs. */
  persistHistory?: boolean
}

export interface Engine {
  readonly config: EngineConfig
  readonly store: FragmentStore | null
  readonly extractor: SnapshotExtractor
  readonly locator: ElementLocator
  run(instruction: string | ExecutionStep[]): Promise<RunReport>
  close(): Promise<void>
}

/** Wires every collaborator from one resolved config. */
export function createEngine(config: EngineConfig, logger: Logger, deps: EngineDeps = {}): Engine {
  const extractor = new SnapshotExtractor(logger.child({ component: 'extractor' }), {
    clickableCap: config.scanCap,
    elementTimeoutMs: config.elementTimeoutMs,
  })
  const registry = defaultRegistry(logger.child({ component: 'components' }))

  const history = new HistoryStore(logger, deps.persistHistory ? historyFile(config) : undefined)
  history.load()
  const embedder = deps.embedder === undefined ? createEmbedder(config) : deps.embedder
  const semantic = new SemanticScorer(embedder, logger.child({ component: 'semantic' }), config.embeddingCacheSize)
  const ranker = new CandidateRanker(strategyFor(config.rankerVariant), semantic, history)
  const healer = new SelfHealingResolver(logger.child({ component: 'healer' }))
  const screenReader = deps.screenReader === undefined ? createScreenReader(config, logger) : deps.screenReader
  const locator = new ElementLocator(
    extractor,
    registry,
    ranker,
    healer,
    logger.child({ component: 'locator' }),
    config.maxCandidateTries,
    screenReader,
  )

  const store = config.fragmentsEnabled
    ? new FragmentStore(fragmentsFile(config), logger.child({ component: 'fragments' }), { ttlDays: config.fragmentTtlDays })
    : null
  const table = deps.shortcuts ?? defaultShortcuts()
  const optimizer = new FlowOptimizer(
    logger.child({ component: 'optimizer' }),
    store ? new FragmentMatcher(store) : null,
    new UrlShortcutRegistry(table.url),
    new StateShortcutRegistry(table.state),
  )

  const completion = createCompletion(config)
  const planner = deps.planner ?? (completion ? new OpenAIPlanner(completion) : new StaticPlanner([]))
  const advisor = deps.advisor ?? (completion ? new OpenAIRecoveryAdvisor(completion, logger) : new TableRecoveryAdvisor())
  const trace = config.traceEnabled ? new TraceLogger(traceDir(config), logger.child({ component: 'trace' })) : null
  const session = deps.session ?? new BrowserSession(config, logger.child({ component: 'browser' }), deps.sessionOptions)

  const machine = new RunStateMachine(
    { session, planner, locator, extractor, advisor, logger, optimizer, store, trace, resolvers: deps.resolvers },
    {
      maxRecoveryAttempts: config.maxRecoveryAttempts,
      actionTimeoutMs: config.actionTimeoutMs,
      navigationTimeoutMs: config.browserTimeoutMs,
      fragmentMinLength: config.fragmentMinLength,
      recordFragments: config.fragmentsEnabled,
    },
  )

  return {
    config,
    store,
    extractor,
    locator,
    run: (instruction) => machine.run(instruction),
    async close() {
      history.save()
      await trace?.close()
    },
  }
}

function createScreenReader(config: EngineConfig, logger: Logger): ScreenReader | null {
  const complete = createImageCompletion(config)
  return complete ? new ModelScreenReader(complete, logger.child({ component: 'vision' })) : null
}
