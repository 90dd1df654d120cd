/**
 * Tic-tac-toe rules: place a mark on any empty cell until a line is
 * complete or the board is full.
 */
import { Actor, Rule } from '../../core/types';
import { IllegalActionError } from '../../core/errors';
import {
  Board,
  FIELD_SIZE,
  Placement,
  at,
  gameResult,
  isOnBoard,
  place,
} from './board';

export class TicTacToeRule implements Rule<Board, Placement> {
  isTerminal(board: Board): boolean {
    return gameResult(board) !== null;
  }

  /**
   * Empty cells row by row. A finished game has no legal actions, even
   * when cells are left.
   */
  legalActions(board: Board, actor: Actor): Placement[] {
    if (this.isTerminal(board)) return [];

    const actions: Placement[] = [];
    for (let row = 0; row < FIELD_SIZE; row++) {
      for (let column = 0; column < FIELD_SIZE; column++) {
        if (at(board, column, row) === null) {
          actions.push({ actor, column, row });
        }
      }
    }
    return actions;
  }

  apply(board: Board, placement: Placement): Board {
    if (!isOnBoard(placement.column, placement.row)) {
      throw new IllegalActionError(
        `Cell (${placement.column}, ${placement.row}) is off the board`,
        placement
      );
    }
    if (this.isTerminal(board)) {
      throw new IllegalActionError('The game is already over', placement);
    }
    if (at(board, placement.column, placement.row) !== null) {
      throw new IllegalActionError(
        `Cell (${placement.column}, ${placement.row}) is already taken`,
        placement
      );
    }
    return place(board, placement);
  }
}
