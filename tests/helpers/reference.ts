/**
 * Plain full-width minimax with no window and no tree, used as the
 * yardstick for the engines. Same depth convention: the root always
 * expands, then `depth` more plies.
 */
import { Actor, Evaluator, GameAction, Rule, opponent } from '../../src/core/types';

export function referenceValue<S, A extends GameAction, P>(
  rule: Rule<S, A>,
  evaluator: Evaluator<S, P>,
  position: S,
  actorToMove: Actor,
  remainingDepth: number,
  searcher: Actor
): P | null {
  if (remainingDepth === 0 || rule.isTerminal(position)) {
    return evaluator.scoreFor(searcher, position);
  }

  let best: P | null = null;
  for (const action of rule.legalActions(position, actorToMove)) {
    const value = referenceValue(
      rule,
      evaluator,
      rule.apply(position, action),
      opponent(actorToMove),
      remainingDepth - 1,
      searcher
    );
    if (value === null) continue;
    const order = best === null ? 0 : evaluator.scale.compare(value, best);
    if (best === null || (actorToMove === searcher ? order > 0 : order < 0)) {
      best = value;
    }
  }
  return best;
}

export function referenceSelect<S, A extends GameAction, P>(
  rule: Rule<S, A>,
  evaluator: Evaluator<S, P>,
  position: S,
  actor: Actor,
  depth: number
): A | null {
  if (rule.isTerminal(position)) return null;

  let bestAction: A | null = null;
  let bestValue: P | null = null;
  for (const action of rule.legalActions(position, actor)) {
    const value = referenceValue(
      rule,
      evaluator,
      rule.apply(position, action),
      opponent(actor),
      depth,
      actor
    );
    if (value === null) continue;
    if (bestValue === null || evaluator.scale.compare(value, bestValue) > 0) {
      bestValue = value;
      bestAction = action;
    }
  }
  return bestAction;
}
