/**
 * Per-search bookkeeping: counters and cooperative cancellation.
 *
 * A fresh context is created for every search so strategy instances carry
 * no state from one call to the next.
 */
import { SearchAbortedError } from '../core/errors';
import type { SearchStats } from '../core/types';
import type { ResolvedSearchConfig } from './config';

export class SearchContext {
  nodesVisited = 0;
  leavesEvaluated = 0;
  cutoffs = 0;

  private readonly startTime: number;
  private readonly deadline: number | null;
  private readonly signal: AbortSignal | null;

  constructor(config: ResolvedSearchConfig) {
    this.startTime = Date.now();
    this.deadline = config.timeLimitMs === null ? null : this.startTime + config.timeLimitMs;
    this.signal = config.signal;
  }

  /**
   * Called once per node. Throws when the search has been cancelled or has
   * used up its time.
   */
  visit(): void {
    if (this.signal?.aborted) {
      throw new SearchAbortedError('aborted', this.nodesVisited);
    }
    if (this.deadline !== null && Date.now() >= this.deadline) {
      throw new SearchAbortedError('timeout', this.nodesVisited);
    }
    this.nodesVisited++;
  }

  stats(): SearchStats {
    return {
      nodesVisited: this.nodesVisited,
      leavesEvaluated: this.leavesEvaluated,
      cutoffs: this.cutoffs,
      elapsedMs: Date.now() - this.startTime,
    };
  }
}
