/**
 * Unit tests for the negamax engine and its ranked root alternatives.
 */
import { describe, it, expect } from 'vitest';
import { NegamaxStrategy } from '../../src/search/negamax';
import { InvalidConfigError, SearchAbortedError } from '../../src/core/errors';
import type { Evaluator } from '../../src/core/types';
import {
  TreeEvaluator,
  TreePosition,
  TreeRule,
  branch,
  leaf,
  stalemate,
  start,
} from '../helpers/treeGame';

const rule = new TreeRule();

const PRUNABLE = branch(branch(leaf(3), leaf(5)), branch(leaf(2), leaf(9)));

describe('NegamaxStrategy', () => {
  it('should pick the same action and payoff as minimax', () => {
    const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2 });
    const result = strategy.search(start(PRUNABLE), 'first');

    expect(result.action).toEqual({ actor: 'first', index: 0 });
    expect(result.payoff).toBe(3);
    expect(result.principalVariation).toEqual([
      { actor: 'first', index: 0 },
      { actor: 'second', index: 0 },
    ]);
  });

  it('should count one cutoff on the prunable tree', () => {
    const evaluator = new TreeEvaluator();
    const strategy = new NegamaxStrategy(rule, evaluator, { depth: 2 });
    const result = strategy.search(start(PRUNABLE), 'first');

    expect(evaluator.scored).toEqual(['0.0', '0.1', '1.0']);
    expect(result.stats.nodesVisited).toBe(6);
    expect(result.stats.leavesEvaluated).toBe(3);
    expect(result.stats.cutoffs).toBe(1);
  });

  it('should search from the second actor\'s point of view', () => {
    const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 1 });
    const result = strategy.search(start(branch(leaf(5), leaf(-2))), 'second');

    expect(result.action).toEqual({ actor: 'second', index: 1 });
    expect(result.payoff).toBe(2);
  });

  describe('ranked actions', () => {
    it('should mark a pruned alternative as an upper bound', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2 });
      const result = strategy.search(start(PRUNABLE), 'first');

      expect(result.rankedActions).toEqual([
        { rank: 1, action: { actor: 'first', index: 0 }, payoff: 3, bound: 'exact' },
        { rank: 2, action: { actor: 'first', index: 1 }, payoff: 2, bound: 'upper' },
      ]);
    });

    it('should rank every alternative exactly without pruning', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2, pruning: false });
      const result = strategy.search(start(PRUNABLE), 'first');

      expect(result.rankedActions).toEqual([
        { rank: 1, action: { actor: 'first', index: 0 }, payoff: 3, bound: 'exact' },
        { rank: 2, action: { actor: 'first', index: 1 }, payoff: 2, bound: 'exact' },
      ]);
      expect(result.stats.cutoffs).toBe(0);
    });

    it('should keep search order among equal payoffs', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 0, pruning: false });
      const result = strategy.search(start(branch(leaf(1), leaf(4), leaf(1), leaf(4))), 'first');

      expect(result.rankedActions.map(r => r.action.index)).toEqual([1, 3, 0, 2]);
      expect(result.action).toEqual({ actor: 'first', index: 1 });
    });

    it('should leave out actions that lead to a stalemate', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2 });
      const result = strategy.search(start(branch(stalemate(), leaf(1))), 'first');

      expect(result.action).toEqual({ actor: 'first', index: 1 });
      expect(result.rankedActions).toEqual([
        { rank: 1, action: { actor: 'first', index: 1 }, payoff: 1, bound: 'exact' },
      ]);
    });

    it('should be empty for a terminal position', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2 });
      const result = strategy.search(start(leaf(6)), 'first');

      expect(result.action).toBeNull();
      expect(result.payoff).toBe(6);
      expect(result.rankedActions).toEqual([]);
    });
  });

  describe('searchTree', () => {
    it('should hand back only the explored part of the tree', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2 });
      const { root } = strategy.searchTree(start(PRUNABLE), 'first');

      expect(root.size()).toBe(6);
      expect(root.children.map(child => child.children.length)).toEqual([2, 1]);
    });

    it('should keep the whole tree without pruning', () => {
      const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2, pruning: false });
      const { root } = strategy.searchTree(start(PRUNABLE), 'first');

      expect(root.size()).toBe(7);
      expect(root.payoff).toBe(3);
    });
  });

  it('should reject a payoff scale without negation', () => {
    const evaluator: Evaluator<TreePosition, number> = {
      scale: { min: 0, max: 10, compare: (a, b) => a - b },
      scoreFor: () => 0,
    };

    expect(() => new NegamaxStrategy(rule, evaluator)).toThrow(InvalidConfigError);
  });

  it('should stop once the time limit is used up', () => {
    const strategy = new NegamaxStrategy(rule, new TreeEvaluator(), { depth: 2, timeLimitMs: 0 });

    expect(() => strategy.search(start(PRUNABLE), 'first')).toThrow(SearchAbortedError);
  });
});
