/**
 * Negamax search with alpha-beta pruning.
 *
 * Relies on the zero-sum law scoreFor(opponent(a), p) == negate(scoreFor(a, p)):
 * every node maximizes from the point of view of the actor to move, and a
 * child's payoff is negated (and the window mirrored) across each turn
 * boundary. With an evaluator that honours the law this picks the same
 * actions as AlphaBetaStrategy; with one that does not, it silently picks
 * different ones. Use assertZeroSum to catch that.
 *
 * Unlike the minimax engine this keeps every explored child, so the
 * runner-up actions at the root can be ranked after the search.
 */
import {
  Actor,
  BoundKind,
  Evaluator,
  GameAction,
  NegamaxSearchResult,
  RankedAction,
  Rule,
  Strategy,
  opponent,
} from '../core/types';
import { InvalidConfigError, InvalidWindowError } from '../core/errors';
import { NegatablePayoffScale, isNegatable } from '../core/payoff';
import { ResolvedSearchConfig, SearchConfig, resolveSearchConfig } from './config';
import { SearchContext } from './context';
import { TreeNode } from './node';
import { SearchWindow } from './window';
import { createLogger } from '../utils/logger';

const logger = createLogger('negamax');

export class NegamaxStrategy<S, A extends GameAction, P> implements Strategy<S, A> {
  readonly config: ResolvedSearchConfig;
  private readonly scale: NegatablePayoffScale<P>;

  constructor(
    private readonly rule: Rule<S, A>,
    private readonly evaluator: Evaluator<S, P>,
    config: Partial<SearchConfig> = {}
  ) {
    this.config = resolveSearchConfig(config);
    const scale = evaluator.scale;
    if (!isNegatable(scale)) {
      throw new InvalidConfigError('Negamax needs a payoff scale with a negate operation');
    }
    this.scale = scale;
  }

  selectAction(position: S, actor: Actor): A | null {
    return this.search(position, actor).action;
  }

  search(
    position: S,
    actor: Actor,
    window: SearchWindow<P> = SearchWindow.full(this.scale)
  ): NegamaxSearchResult<A, P> {
    return this.searchTree(position, actor, window).result;
  }

  /**
   * Like search, but also hands back the explored tree.
   */
  searchTree(
    position: S,
    actor: Actor,
    window: SearchWindow<P> = SearchWindow.full(this.scale)
  ): { result: NegamaxSearchResult<A, P>; root: TreeNode<S, A, P> } {
    const context = new SearchContext(this.config);
    const root = new TreeNode<S, A, P>(position, null);

    // The root always spends one ply choosing its own action.
    const payoff = this.negamax(this.config.depth + 1, root, actor, window, context);
    root.payoff = payoff;

    const result: NegamaxSearchResult<A, P> = {
      action: root.best?.causeAction ?? null,
      payoff,
      principalVariation: root.principalVariation(),
      rankedActions: this.rankChildren(root),
      stats: context.stats(),
    };

    logger.debug(
      {
        actor,
        depth: this.config.depth,
        pruning: this.config.pruning,
        treeSize: root.size(),
        ...result.stats,
      },
      result.action === null ? 'Negamax search found no action' : 'Negamax search complete'
    );

    return { result, root };
  }

  /**
   * @returns The payoff of `node` for `actorToMove`, or null when the node
   *          is not terminal yet `actorToMove` has no action.
   */
  private negamax(
    remainingDepth: number,
    node: TreeNode<S, A, P>,
    actorToMove: Actor,
    window: SearchWindow<P>,
    context: SearchContext
  ): P | null {
    context.visit();
    if (!window.isValid()) {
      throw new InvalidWindowError(window.lo, window.hi);
    }

    if (remainingDepth === 0 || this.rule.isTerminal(node.position)) {
      context.leavesEvaluated++;
      return this.evaluator.scoreFor(actorToMove, node.position);
    }

    let best: P | null = null;
    let currentWindow = window;

    for (const action of this.rule.legalActions(node.position, actorToMove)) {
      const child = new TreeNode<S, A, P>(this.rule.apply(node.position, action), action);
      node.addChild(child);

      const searchedWithin = currentWindow;
      const reply = this.negamax(
        remainingDepth - 1,
        child,
        opponent(actorToMove),
        currentWindow.negated(this.scale),
        context
      );
      if (reply === null) continue;

      const payoff = this.scale.negate(reply);
      child.payoff = payoff;
      child.bound = this.classify(payoff, searchedWithin);

      if (best !== null && this.scale.compare(payoff, best) <= 0) continue;

      best = payoff;
      node.markBest(child);

      if (!this.config.pruning) continue;

      const narrowed = currentWindow.raiseLower(payoff);
      if (narrowed === null) {
        context.cutoffs++;
        logger.trace(
          { actorToMove, payoff: String(payoff), window: currentWindow.toString() },
          'Cutoff'
        );
        break;
      }
      currentWindow = narrowed;
    }

    return best;
  }

  /**
   * A payoff found inside the window it was searched with is exact. Below
   * it the subtree failed low and the payoff is an upper bound; above it the
   * subtree was cut off and the payoff is a lower bound.
   */
  private classify(payoff: P, window: SearchWindow<P>): BoundKind {
    if (this.scale.compare(payoff, window.lo) < 0) return 'upper';
    if (this.scale.compare(payoff, window.hi) > 0) return 'lower';
    return 'exact';
  }

  private rankChildren(root: TreeNode<S, A, P>): RankedAction<A, P>[] {
    const scored: { action: A; payoff: P; bound: BoundKind }[] = [];
    for (const child of root.children) {
      if (child.causeAction === null || child.payoff === null) continue;
      scored.push({ action: child.causeAction, payoff: child.payoff, bound: child.bound });
    }

    // Array.prototype.sort is stable, so equal payoffs stay in search order.
    return scored
      .sort((a, b) => this.scale.compare(b.payoff, a.payoff))
      .map((entry, i) => ({ rank: i + 1, ...entry }));
  }
}
