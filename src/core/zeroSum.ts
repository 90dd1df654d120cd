/**
 * Zero-sum law checker.
 *
 * Negamax is only correct when scoreFor(opponent(a), p) equals
 * negate(scoreFor(a, p)) for every reachable p. Nothing in the type system
 * enforces that, so this samples positions along random playouts and
 * compares both sides' payoffs.
 */
import { Actor, ACTORS, Evaluator, GameAction, Rule, opponent } from './types';
import { InvalidConfigError, ZeroSumViolationError } from './errors';
import { isNegatable } from './payoff';
import { SeededRandom } from '../utils/random';

export interface SamplingOptions {
  /** Maximum number of positions to collect, the start included. */
  samples?: number;
  seed?: number;
  /** Maximum length of a single playout. */
  maxPlies?: number;
  startingActor?: Actor;
}

export interface ZeroSumViolation<S, P> {
  readonly position: S;
  readonly actor: Actor;
  readonly payoff: P;
  readonly opponentPayoff: P;
}

const DEFAULT_SAMPLES = 200;
const DEFAULT_SEED = 1;
const DEFAULT_MAX_PLIES = 64;

/**
 * Collects positions reachable from `start` by playing random legal actions,
 * restarting from `start` whenever a playout ends.
 */
export function sampleReachablePositions<S, A extends GameAction>(
  rule: Rule<S, A>,
  start: S,
  options: SamplingOptions = {}
): S[] {
  const samples = options.samples ?? DEFAULT_SAMPLES;
  const maxPlies = options.maxPlies ?? DEFAULT_MAX_PLIES;
  const rng = new SeededRandom(options.seed ?? DEFAULT_SEED);
  const positions: S[] = [start];

  while (positions.length < samples) {
    let position = start;
    let actor = options.startingActor ?? 'first';
    let added = 0;

    for (let ply = 0; ply < maxPlies && positions.length < samples; ply++) {
      if (rule.isTerminal(position)) break;
      const action = rng.pick([...rule.legalActions(position, actor)]);
      if (action === undefined) break;

      position = rule.apply(position, action);
      positions.push(position);
      added++;
      actor = opponent(actor);
    }

    // Nothing is reachable from the start.
    if (added === 0) break;
  }

  return positions;
}

export function findZeroSumViolations<S, A extends GameAction, P>(
  rule: Rule<S, A>,
  evaluator: Evaluator<S, P>,
  start: S,
  options: SamplingOptions = {}
): ZeroSumViolation<S, P>[] {
  const scale = evaluator.scale;
  if (!isNegatable(scale)) {
    throw new InvalidConfigError('The zero-sum law needs a payoff scale with a negate operation');
  }

  const violations: ZeroSumViolation<S, P>[] = [];
  for (const position of sampleReachablePositions(rule, start, options)) {
    for (const actor of ACTORS) {
      const payoff = evaluator.scoreFor(actor, position);
      const opponentPayoff = evaluator.scoreFor(opponent(actor), position);
      if (scale.compare(opponentPayoff, scale.negate(payoff)) !== 0) {
        violations.push({ position, actor, payoff, opponentPayoff });
      }
    }
  }
  return violations;
}

/**
 * Throws ZeroSumViolationError when any sampled position breaks the law.
 */
export function assertZeroSum<S, A extends GameAction, P>(
  rule: Rule<S, A>,
  evaluator: Evaluator<S, P>,
  start: S,
  options: SamplingOptions = {}
): void {
  const violations = findZeroSumViolations(rule, evaluator, start, options);
  if (violations.length > 0) {
    const first = violations[0];
    throw new ZeroSumViolationError(
      violations.length,
      `${first.actor} scores ${String(first.payoff)} but ${opponent(first.actor)} scores ${String(first.opponentPayoff)}`
    );
  }
}
