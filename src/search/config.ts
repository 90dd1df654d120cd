/**
 * Search configuration and its validation.
 */
import { InvalidConfigError } from '../core/errors';

export const DEFAULT_SEARCH_DEPTH = 4;

export interface SearchConfig {
  /**
   * Plies searched below each candidate action. 0 picks the action whose
   * resulting position scores best right away.
   */
  depth: number;
  /** Alpha-beta pruning; turning it off gives plain full-width minimax. */
  pruning?: boolean;
  /** Abort the search once it has run this long. */
  timeLimitMs?: number;
  signal?: AbortSignal;
}

export interface ResolvedSearchConfig {
  readonly depth: number;
  readonly pruning: boolean;
  readonly timeLimitMs: number | null;
  readonly signal: AbortSignal | null;
}

export function resolveSearchConfig(config: Partial<SearchConfig> = {}): ResolvedSearchConfig {
  const depth = config.depth ?? DEFAULT_SEARCH_DEPTH;
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidConfigError(
      `Invalid search depth: ${depth}. Expected a non-negative integer.`
    );
  }

  const timeLimitMs = config.timeLimitMs ?? null;
  if (timeLimitMs !== null && (!Number.isFinite(timeLimitMs) || timeLimitMs < 0)) {
    throw new InvalidConfigError(
      `Invalid time limit: ${timeLimitMs}. Expected a non-negative number of milliseconds.`
    );
  }

  return {
    depth,
    pruning: config.pruning ?? true,
    timeLimitMs,
    signal: config.signal ?? null,
  };
}
