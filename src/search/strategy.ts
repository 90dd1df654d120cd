/**
 * Public entry points: pick the best action for an actor.
 */
import type { Actor, Evaluator, GameAction, Rule, SearchVariant } from '../core/types';
import { InvalidConfigError } from '../core/errors';
import type { SearchConfig } from './config';
import { AlphaBetaStrategy } from './alphabeta';
import { NegamaxStrategy } from './negamax';

export interface StrategyOptions extends Partial<SearchConfig> {
  /** Defaults to 'minimax'. */
  variant?: SearchVariant;
}

export type SearchStrategy<S, A extends GameAction, P> =
  | AlphaBetaStrategy<S, A, P>
  | NegamaxStrategy<S, A, P>;

export function createStrategy<S, A extends GameAction, P>(
  rule: Rule<S, A>,
  evaluator: Evaluator<S, P>,
  options: StrategyOptions = {}
): SearchStrategy<S, A, P> {
  const { variant = 'minimax', ...config } = options;
  switch (variant) {
    case 'minimax':
      return new AlphaBetaStrategy(rule, evaluator, config);
    case 'negamax':
      return new NegamaxStrategy(rule, evaluator, config);
    default:
      throw new InvalidConfigError(`Unknown search variant: "${String(variant)}"`);
  }
}

/**
 * Best action for `actor` in `position`, looking `searchDepth` plies past
 * each candidate action. Returns null when `actor` has nothing to play.
 *
 * Keeps no state between calls; the rule and evaluator are only read.
 */
export function selectAction<S, A extends GameAction, P>(
  rule: Rule<S, A>,
  evaluator: Evaluator<S, P>,
  position: S,
  actor: Actor,
  searchDepth: number,
  options: Omit<StrategyOptions, 'depth'> = {}
): A | null {
  return createStrategy(rule, evaluator, { ...options, depth: searchDepth }).selectAction(
    position,
    actor
  );
}

export function parseVariant(value: string): SearchVariant {
  const lower = value.toLowerCase().trim();
  if (lower === 'minimax' || lower === 'negamax') return lower;
  throw new InvalidConfigError(
    `Unknown search variant: "${value}". Valid variants: minimax, negamax`
  );
}
