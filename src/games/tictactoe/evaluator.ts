/**
 * Tic-tac-toe evaluators. Both satisfy the zero-sum law, so either can
 * drive the negamax engine.
 */
import { Actor, Evaluator, opponent } from '../../core/types';
import { NegatablePayoffScale, numericScale, ordinalScale } from '../../core/payoff';
import { Board, CELL_COUNT, LINES, emptyCellCount, gameResult } from './board';

// ─── Centre mass (ordinal) ───────────────────────────────────────────

export const CENTER_MASS_LEVELS = [
  'lose',
  'center-taken',
  'equal',
  'center-held',
  'win',
] as const;

export type CenterMassLevel = (typeof CENTER_MASS_LEVELS)[number];

const CENTER = Math.floor(CELL_COUNT / 2);

/**
 * Win, lose or draw once the game is over; otherwise only who holds the
 * centre cell matters.
 */
export class CenterMassEvaluator implements Evaluator<Board, CenterMassLevel> {
  readonly scale: NegatablePayoffScale<CenterMassLevel> = ordinalScale(CENTER_MASS_LEVELS);

  scoreFor(actor: Actor, board: Board): CenterMassLevel {
    const result = gameResult(board);
    if (result?.kind === 'win') return result.winner === actor ? 'win' : 'lose';
    if (result?.kind === 'draw') return 'equal';

    const center = board.cells[CENTER];
    if (center === null) return 'equal';
    return center === actor ? 'center-held' : 'center-taken';
  }
}

// ─── Open lines (numeric) ────────────────────────────────────────────

/** Beats any heuristic score: 8 lines * 2^2 marks. */
export const WIN_SCORE = 100;

/**
 * Finished games score WIN_SCORE plus the number of empty cells, so faster
 * wins and slower losses are preferred. Unfinished games score the squared
 * mark count of every line the opponent has not blocked, minus the same
 * for the opponent.
 */
export class OpenLinesEvaluator implements Evaluator<Board, number> {
  readonly scale: NegatablePayoffScale<number> = numericScale({
    min: -(WIN_SCORE + CELL_COUNT),
    max: WIN_SCORE + CELL_COUNT,
  });

  scoreFor(actor: Actor, board: Board): number {
    const result = gameResult(board);
    if (result?.kind === 'win') {
      const score = WIN_SCORE + emptyCellCount(board);
      return result.winner === actor ? score : -score;
    }
    if (result?.kind === 'draw') return 0;

    return openLineScore(board, actor) - openLineScore(board, opponent(actor));
  }
}

export function openLineScore(board: Board, actor: Actor): number {
  let score = 0;
  for (const line of LINES) {
    const marks = line.map(i => board.cells[i]);
    if (marks.includes(opponent(actor))) continue;
    const own = marks.filter(cell => cell === actor).length;
    score += own * own;
  }
  return score;
}
