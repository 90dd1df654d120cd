/**
 * Output formatter for the duelsearch CLI.
 * Produces plain text only.
 *
 * Formatting rules:
 * - Boards are three rows of F (first), S (second) and - (empty)
 * - Actions read "<actor> places at (<column>, <row>)"
 * - Ranked alternatives carry their bound kind when pruning made them inexact
 */
import type { Actor, RankedAction, SearchResult, SearchVariant } from '../core/types';
import type { ZeroSumViolation } from '../core/zeroSum';
import { Board, GameResult, Placement, formatBoard, formatPlacement } from '../games/tictactoe';

export interface SuggestionReport<P> {
  board: Board;
  actor: Actor;
  variant: SearchVariant;
  depth: number;
  pruning: boolean;
  result: SearchResult<Placement, P>;
  rankedActions?: readonly RankedAction<Placement, P>[];
  gameOver: boolean;
}

export interface PlayedTurn {
  board: Board;
  actor: Actor;
  action: Placement | null;
}

/**
 * Format the result of a single search.
 */
export function formatSuggestion<P>(report: SuggestionReport<P>): string {
  const { result } = report;
  const lines: string[] = [];

  lines.push(`duelsearch suggestion for ${report.actor}`);
  lines.push(
    `Depth: ${report.depth} | Variant: ${report.variant} | Pruning: ${report.pruning ? 'on' : 'off'}`
  );
  lines.push('');
  lines.push(formatBoard(report.board));
  lines.push('');

  if (result.action === null) {
    lines.push(
      report.gameOver
        ? 'No action available: the game is over.'
        : `No action available for ${report.actor}.`
    );
  } else {
    lines.push(`Best action: ${formatPlacement(result.action)}`);
    if (result.payoff !== null) {
      lines.push(`Payoff: ${String(result.payoff)}`);
    }
    lines.push(`Expected line: ${result.principalVariation.map(formatPlacement).join(' -> ')}`);
  }

  if (report.rankedActions && report.rankedActions.length > 0) {
    lines.push('');
    lines.push('Alternatives (ranked):');
    for (const ranked of report.rankedActions) {
      lines.push(formatRankedAction(ranked));
    }
  }

  lines.push('');
  lines.push(formatStats(result));

  return lines.join('\n');
}

function formatRankedAction<P>(ranked: RankedAction<Placement, P>): string {
  const bound =
    ranked.bound === 'exact' ? '' : ranked.bound === 'upper' ? ' (at most)' : ' (at least)';
  return `${ranked.rank}) ${formatPlacement(ranked.action)}: ${String(ranked.payoff)}${bound}`;
}

function formatStats<P>(result: SearchResult<Placement, P>): string {
  const { stats } = result;
  return (
    `Nodes: ${stats.nodesVisited} | Leaves: ${stats.leavesEvaluated} | ` +
    `Cutoffs: ${stats.cutoffs} | Time: ${(stats.elapsedMs / 1000).toFixed(1)}s`
  );
}

/**
 * Format a self-play game: every board before a move, then the final board
 * and the result.
 */
export function formatGameRecord(
  turns: readonly PlayedTurn[],
  finalBoard: Board,
  result: GameResult | null
): string {
  const lines: string[] = [];

  for (const turn of turns) {
    lines.push(formatBoard(turn.board));
    lines.push(
      turn.action === null
        ? `${turn.actor} has no action`
        : `${turn.actor}'s action: ${formatPlacement(turn.action)}`
    );
    lines.push('');
  }

  lines.push(formatBoard(finalBoard));
  lines.push(`The result is ${formatResult(result)}`);

  return lines.join('\n');
}

export function formatResult(result: GameResult | null): string {
  if (result === null) return 'undecided';
  return result.kind === 'draw' ? 'a draw' : `a win for ${result.winner}`;
}

export function formatVerification<S, P>(
  evaluatorName: string,
  samples: number,
  violations: readonly ZeroSumViolation<S, P>[]
): string {
  if (violations.length === 0) {
    return `Evaluator "${evaluatorName}" satisfies the zero-sum law on ${samples} sampled positions.`;
  }

  const first = violations[0];
  return [
    `Evaluator "${evaluatorName}" breaks the zero-sum law on ${violations.length} check(s).`,
    `First: ${first.actor} scores ${String(first.payoff)}, ` +
      `the opponent scores ${String(first.opponentPayoff)}`,
  ].join('\n');
}
