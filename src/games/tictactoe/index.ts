export {
  FIELD_SIZE,
  CELL_COUNT,
  LINES,
  emptyBoard,
  cellIndex,
  at,
  place,
  emptyCellCount,
  gameResult,
  parseBoard,
  formatBoard,
  cellSymbol,
  formatPlacement,
} from './board';
export type { Board, Cell, Placement, GameResult } from './board';
export { TicTacToeRule } from './rule';
export {
  CenterMassEvaluator,
  OpenLinesEvaluator,
  CENTER_MASS_LEVELS,
  WIN_SCORE,
  openLineScore,
} from './evaluator';
export type { CenterMassLevel } from './evaluator';
