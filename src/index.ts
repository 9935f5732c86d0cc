export { resolveConfig, fragmentsFile, traceDir } from './config'
export type { ConfigOverrides, EngineConfig, RankerVariant } from './config'
export { createLogger, silentLogger } from './logger'
export type { Logger } from './logger'
export * from './errors'

export type { PageDriver, ElementRef, Box } from './driver/types'
export { PlaywrightPageDriver } from './driver/playwright'
export { BrowserSession } from './browser/session'
export type { PageSession } from './browser/session'

export { SnapshotExtractor } from './snapshot/extractor'
export type { ElementCandidate, ElementDescriptor } from './snapshot/types'
export { ComponentRegistry, defaultRegistry } from './components/registry'
export type { ComponentKind, SemanticComponent } from './components/types'

export { CandidateRanker } from './ranking/ranker'
export type { RankedCandidate } from './ranking/ranker'
export { STRATEGIES, strategyFor } from './ranking/weights'
export { SemanticScorer, OpenAIEmbedder, fallbackSimilarity } from './ranking/embeddings'
export type { TextEmbedder } from './ranking/embeddings'
export { HistoryStore } from './ranking/history'
export { ModelScreenReader } from './ranking/vision'
export type { ScreenReader } from './ranking/vision'

export { ElementLocator } from './resolution/locator'
export { SelfHealingResolver } from './resolution/self-healing'
export { defaultResolvers } from './resolution/resolvers'
export type { StepResolver, ResolverContext, Resolution } from './resolution/resolvers'

export { capture, validTransition, validNavigation, isErrorState } from './state/fingerprint'
export type { PageState } from './state/fingerprint'
export { classifyPage } from './state/page-type'
export type { PageType } from './state/page-type'

export { FragmentStore } from './flow/fragment-store'
export type { FlowFragment } from './flow/fragment-store'
export { FragmentMatcher } from './flow/fragment-matcher'
export { FlowOptimizer } from './flow/optimizer'
export { UrlShortcutRegistry, StateShortcutRegistry, defaultShortcuts } from './flow/shortcuts'
export { dedupSteps, deduplicateSteps } from './flow/dedup'

export { ActionExecutor } from './engine/executor'
export { RunStateMachine } from './engine/state-machine'
export { createEngine } from './engine/factory'
export type { Engine, EngineDeps } from './engine/factory'
export { StaticPlanner, JsonPlanner, OpenAIPlanner, parseSteps } from './engine/planner'
export type { Planner } from './engine/planner'
export { NoopRecoveryAdvisor, TableRecoveryAdvisor, OpenAIRecoveryAdvisor } from './engine/recovery'
export type { RecoveryAdvisor, RecoverySuggestion } from './engine/recovery'
export type { ActionKind, ActionResult, ExecutionStep, RunReport } from './engine/types'
