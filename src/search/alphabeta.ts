/**
 * Minimax search with alpha-beta pruning.
 *
 * Every payoff is taken from the searching actor's point of view: nodes
 * where the searching actor moves keep their highest-scoring child, nodes
 * where the opponent moves keep their lowest. Each node retains only its
 * best child, so the finished tree is a single line of play.
 *
 * Window bookkeeping:
 *   my move        lo = max(lo, v)
 *   opponent move  hi = min(hi, v)
 * and the remaining siblings are skipped once lo > hi.
 */
import {
  Actor,
  Evaluator,
  GameAction,
  Rule,
  SearchResult,
  Strategy,
  opponent,
} from '../core/types';
import { InvalidWindowError } from '../core/errors';
import { ResolvedSearchConfig, SearchConfig, resolveSearchConfig } from './config';
import { SearchContext } from './context';
import { SearchNode } from './node';
import { SearchWindow } from './window';
import { createLogger } from '../utils/logger';

const logger = createLogger('alphabeta');

export class AlphaBetaStrategy<S, A extends GameAction, P> implements Strategy<S, A> {
  readonly config: ResolvedSearchConfig;

  constructor(
    private readonly rule: Rule<S, A>,
    private readonly evaluator: Evaluator<S, P>,
    config: Partial<SearchConfig> = {}
  ) {
    this.config = resolveSearchConfig(config);
  }

  selectAction(position: S, actor: Actor): A | null {
    return this.search(position, actor).action;
  }

  /**
   * Searches `position` for `actor` and reports the chosen action along
   * with its payoff, the expected line of play and search statistics.
   *
   * `window` narrows the root window, e.g. for an aspiration search;
   * outside it the reported payoff is only a bound.
   */
  search(
    position: S,
    actor: Actor,
    window: SearchWindow<P> = SearchWindow.full(this.evaluator.scale)
  ): SearchResult<A, P> {
    const context = new SearchContext(this.config);
    const root = new SearchNode<S, A, P>(position, null);

    // The root always spends one ply choosing its own action.
    const payoff = this.constructBestGameTree(this.config.depth + 1, actor, root, window, context);

    const best = root.child;
    const result: SearchResult<A, P> = {
      action: best?.causeAction ?? null,
      payoff,
      principalVariation: root.principalVariation(),
      stats: context.stats(),
    };

    logger.debug(
      {
        actor,
        depth: this.config.depth,
        pruning: this.config.pruning,
        ...result.stats,
      },
      result.action === null ? 'Minimax search found no action' : 'Minimax search complete'
    );

    return result;
  }

  /**
   * Scores `node`, retaining its best child.
   *
   * @returns The node's payoff for the searching actor, or null when the
   *          node is not terminal yet nobody can act from it.
   */
  private constructBestGameTree(
    remainingDepth: number,
    searcher: Actor,
    node: SearchNode<S, A, P>,
    window: SearchWindow<P>,
    context: SearchContext
  ): P | null {
    context.visit();
    if (!window.isValid()) {
      throw new InvalidWindowError(window.lo, window.hi);
    }

    if (remainingDepth === 0 || this.rule.isTerminal(node.position)) {
      const payoff = this.evaluator.scoreFor(searcher, node.position);
      context.leavesEvaluated++;
      node.payoff = payoff;
      return payoff;
    }

    // Who acts on this position?
    const actorToMove = node.causeAction === null ? searcher : opponent(node.causeAction.actor);
    const maximizing = actorToMove === searcher;
    const scale = this.evaluator.scale;
    let currentWindow = window;

    for (const action of this.rule.legalActions(node.position, actorToMove)) {
      const child = new SearchNode<S, A, P>(this.rule.apply(node.position, action), action);

      const childPayoff = this.constructBestGameTree(
        remainingDepth - 1,
        searcher,
        child,
        currentWindow,
        context
      );
      // Nobody can move from there: not a candidate.
      if (childPayoff === null) continue;

      // Ties keep the child found first.
      if (node.payoff !== null) {
        const order = scale.compare(childPayoff, node.payoff);
        if (maximizing ? order <= 0 : order >= 0) continue;
      }

      node.replaceChild(child);
      node.payoff = childPayoff;

      if (!this.config.pruning) continue;

      const narrowed = maximizing
        ? currentWindow.raiseLower(childPayoff)
        : currentWindow.lowerUpper(childPayoff);
      if (narrowed === null) {
        context.cutoffs++;
        logger.trace(
          { actorToMove, payoff: String(childPayoff), window: currentWindow.toString() },
          'Cutoff'
        );
        break;
      }
      currentWindow = narrowed;
    }

    return node.payoff;
  }
}
