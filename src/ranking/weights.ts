import type { RankerVariant } from '../config'

export const SIGNALS = [
  'exact',
  'substring',
  'keyword',
  'semantic',
  'structural',
  'attribute',
  'visibility',
  'position',
  'region',
  'vision',
] as const

export type Signal = (typeof SIGNALS)[number]

export type WeightTable = Partial<Record<Signal, number>>

export interface TieredThresholds {
  kind: 'tiered'
  /** Targets up to this many characters use `standard`. */
  longTargetChars: number
  standard: number
  long: number
  /** Last-resort floor for long targets or small pools. */
  floor: number
  smallPool: number
}

export interface FlatThresholds {
  kind: 'flat'
  threshold: number
  /** Applied to TYPE and SELECT resolution. */
  inputThreshold: number
  smallPoolFloor: number
  smallPool: number
}

export type ThresholdPolicy = TieredThresholds | FlatThresholds

export interface RankingStrategy {
  name: RankerVariant
  weights: WeightTable
  /** Weights used when no screen-reading pass ran; vision must be absent. */
  weightsWithoutVision?: WeightTable
  thresholds: ThresholdPolicy
  historyBonus: number
}

const TIERED: TieredThresholds = {
  kind: 'tiered',
  longTargetChars: 60,
  standard: 0.65,
  long: 0.35,
  floor: 0.4,
  smallPool: 5,
}

export const STRATEGIES: Record<RankerVariant, RankingStrategy> = {
  legacy: {
    name: 'legacy',
    weights: {
      exact: 0.35,
      semantic: 0.2,
      structural: 0.1,
      attribute: 0.15,
      visibility: 0.05,
      position: 0.05,
      region: 0.1,
    },
    thresholds: TIERED,
    historyBonus: 0.05,
  },
  production: {
    name: 'production',
    weights: {
      exact: 0.12,
      substring: 0.45,
      keyword: 0.15,
      semantic: 0.08,
      structural: 0.08,
      visibility: 0.04,
      position: 0.04,
      attribute: 0.02,
      region: 0.02,
    },
    thresholds: TIERED,
    historyBonus: 0.05,
  },
  fused: {
    name: 'fused',
    weights: { semantic: 0.55, substring: 0.3, vision: 0.15 },
    weightsWithoutVision: { semantic: 0.55 / 0.85, substring: 0.3 / 0.85 },
    thresholds: {
      kind: 'flat',
      threshold: 0.38,
      inputThreshold: 0.3,
      smallPoolFloor: 0.25,
      smallPool: 5,
    },
    historyBonus: 0.05,
  },
}

export function strategyFor(variant: RankerVariant): RankingStrategy {
  return STRATEGIES[variant]
}

/** Weight table in effect for one ranking call. */
export function effectiveWeights(strategy: RankingStrategy, visionRan: boolean): WeightTable {
  if (!visionRan && strategy.weightsWithoutVision) return strategy.weightsWithoutVision
  return strategy.weights
}
