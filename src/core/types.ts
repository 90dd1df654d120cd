/**
 * Core type definitions for the adversarial search engine.
 * Games plug in through the Rule and Evaluator contracts; the engine
 * never looks inside a position or an action beyond what these expose.
 */
import type { PayoffScale } from './payoff';

// ─── Actor (Player) ─────────────────────────────────────────────────
export type Actor = 'first' | 'second';

export const ACTORS: readonly Actor[] = ['first', 'second'] as const;

/**
 * The other player. Applying it twice returns the original actor.
 */
export function opponent(actor: Actor): Actor {
  return actor === 'first' ? 'second' : 'first';
}

export function isActor(value: string): value is Actor {
  return value === 'first' || value === 'second';
}

// ─── Actions ─────────────────────────────────────────────────────────
export interface GameAction {
  /** The actor who takes this action. */
  readonly actor: Actor;
}

// ─── Rule ────────────────────────────────────────────────────────────
/**
 * State transition rules of a game.
 *
 * `apply` must return a new position and leave its input untouched: the
 * engine hands the caller's root position to it directly.
 */
export interface Rule<S, A extends GameAction> {
  isTerminal(position: S): boolean;

  /**
   * Actions available to `actor` in `position`, in the order the engine
   * should try them. Earlier actions win ties.
   */
  legalActions(position: S, actor: Actor): Iterable<A>;

  /**
   * Precondition: `action` is one of `legalActions(position, action.actor)`.
   */
  apply(position: S, action: A): S;
}

// ─── Evaluator ───────────────────────────────────────────────────────
export interface Evaluator<S, P> {
  readonly scale: PayoffScale<P>;

  /**
   * How good `position` is for `actor`. Only called on terminal positions
   * and where the search depth runs out.
   */
  scoreFor(actor: Actor, position: S): P;
}

// ─── Strategy ────────────────────────────────────────────────────────
export interface Strategy<S, A extends GameAction> {
  /**
   * Picks an action for `actor`, or null when it has none to take.
   */
  selectAction(position: S, actor: Actor): A | null;
}

// ─── Search Result ───────────────────────────────────────────────────
export interface SearchStats {
  readonly nodesVisited: number;
  readonly leavesEvaluated: number;
  readonly cutoffs: number;
  readonly elapsedMs: number;
}

export interface SearchResult<A, P> {
  readonly action: A | null;
  /** Root payoff from the searching actor's point of view. */
  readonly payoff: P | null;
  readonly principalVariation: readonly A[];
  readonly stats: SearchStats;
}

/**
 * How far a payoff can be trusted once pruning has cut a subtree short.
 * `upper`: the real payoff is at most this value. `lower`: at least.
 */
export type BoundKind = 'exact' | 'upper' | 'lower';

export interface RankedAction<A, P> {
  readonly rank: number;
  readonly action: A;
  readonly payoff: P;
  readonly bound: BoundKind;
}

export interface NegamaxSearchResult<A, P> extends SearchResult<A, P> {
  /** Every explored root action, best first. */
  readonly rankedActions: readonly RankedAction<A, P>[];
}

export type SearchVariant = 'minimax' | 'negamax';
