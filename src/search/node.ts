/**
 * Game tree nodes.
 *
 * SearchNode keeps only the best continuation found so far (minimax, memory
 * linear in depth). TreeNode keeps every explored child (negamax, memory
 * exponential in depth) so runner-up actions can be inspected afterwards.
 * An engine uses exactly one of the two shapes.
 */
import type { BoundKind } from '../core/types';

export class SearchNode<S, A, P> {
  payoff: P | null = null;
  private retained: SearchNode<S, A, P> | null = null;

  /**
   * The root holds the caller's position by reference; every other node
   * holds a position freshly returned by the rule.
   */
  constructor(
    readonly position: Readonly<S>,
    readonly causeAction: A | null
  ) {}

  get child(): SearchNode<S, A, P> | null {
    return this.retained;
  }

  /**
   * Retains `child` as the best continuation. The previously retained
   * subtree is dropped.
   */
  replaceChild(child: SearchNode<S, A, P>): void {
    this.retained = child;
  }

  /**
   * Actions along the retained chain, starting below this node.
   */
  principalVariation(): A[] {
    const line: A[] = [];
    for (let node = this.retained; node !== null; node = node.retained) {
      if (node.causeAction !== null) line.push(node.causeAction);
    }
    return line;
  }
}

export class TreeNode<S, A, P> {
  /** From the point of view of the actor whose action produced this node. */
  payoff: P | null = null;
  bound: BoundKind = 'exact';
  private readonly explored: TreeNode<S, A, P>[] = [];
  private bestIndex: number | null = null;

  constructor(
    readonly position: Readonly<S>,
    readonly causeAction: A | null
  ) {}

  get children(): readonly TreeNode<S, A, P>[] {
    return this.explored;
  }

  get best(): TreeNode<S, A, P> | null {
    return this.bestIndex === null ? null : this.explored[this.bestIndex];
  }

  addChild(child: TreeNode<S, A, P>): void {
    this.explored.push(child);
  }

  /**
   * Marks an already added child as the best one.
   */
  markBest(child: TreeNode<S, A, P>): void {
    const index = this.explored.indexOf(child);
    if (index < 0) {
      throw new Error('Cannot mark a node that is not a child of this node as best');
    }
    this.bestIndex = index;
  }

  principalVariation(): A[] {
    const line: A[] = [];
    for (let node = this.best; node !== null; node = node.best) {
      if (node.causeAction !== null) line.push(node.causeAction);
    }
    return line;
  }

  /**
   * Total number of nodes in this subtree, this node included.
   */
  size(): number {
    return this.explored.reduce((sum, child) => sum + child.size(), 1);
  }
}
