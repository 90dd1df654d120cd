export { ACTORS, opponent, isActor } from './core/types';
export type {
  Actor,
  GameAction,
  Rule,
  Evaluator,
  Strategy,
  SearchStats,
  SearchResult,
  NegamaxSearchResult,
  RankedAction,
  BoundKind,
  SearchVariant,
} from './core/types';
export {
  numericScale,
  ordinalScale,
  isNegatable,
  checkNegation,
  maxPayoff,
  minPayoff,
} from './core/payoff';
export type { PayoffScale, NegatablePayoffScale, NegationFailure } from './core/payoff';
export {
  IllegalActionError,
  InvalidWindowError,
  SearchAbortedError,
  InvalidConfigError,
  ZeroSumViolationError,
} from './core/errors';
export type { AbortReason } from './core/errors';
export { sampleReachablePositions, findZeroSumViolations, assertZeroSum } from './core/zeroSum';
export type { SamplingOptions, ZeroSumViolation } from './core/zeroSum';
export * from './search';
export * from './games/tictactoe';
