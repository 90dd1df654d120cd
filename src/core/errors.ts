/**
 * Error types raised by the search engine and the bundled games.
 *
 * Running out of legal actions is not an error: strategies return null.
 */

/**
 * An action was applied to a position where it is not legal.
 * This is a broken caller contract, not something to recover from.
 */
export class IllegalActionError extends Error {
  readonly action: unknown;

  constructor(message: string, action: unknown) {
    super(message);
    this.name = 'IllegalActionError';
    this.action = action;
  }
}

/**
 * A window with its lower bound above its upper bound reached the search.
 * The engine only ever narrows the windows it builds, so this means the
 * window came from outside or the engine itself is broken.
 */
export class InvalidWindowError extends Error {
  constructor(lo: unknown, hi: unknown) {
    super(`Invalid search window: lower bound ${String(lo)} is above upper bound ${String(hi)}`);
    this.name = 'InvalidWindowError';
  }
}

export type AbortReason = 'aborted' | 'timeout';

export class SearchAbortedError extends Error {
  readonly reason: AbortReason;
  readonly nodesVisited: number;

  constructor(reason: AbortReason, nodesVisited: number) {
    super(
      reason === 'timeout'
        ? `Search exceeded its time limit after ${nodesVisited} nodes`
        : `Search was cancelled after ${nodesVisited} nodes`
    );
    this.name = 'SearchAbortedError';
    this.reason = reason;
    this.nodesVisited = nodesVisited;
  }
}

export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export class ZeroSumViolationError extends Error {
  readonly violations: number;

  constructor(violations: number, example: string) {
    super(
      `Evaluator breaks the zero-sum law on ${violations} sampled position(s); first: ${example}`
    );
    this.name = 'ZeroSumViolationError';
    this.violations = violations;
  }
}
