/**
 * CLI command implementations. Each returns the text to print so the
 * commands can be exercised without spawning a process.
 */
import { Actor, Evaluator, SearchVariant, isActor, opponent } from '../core/types';
import { InvalidConfigError } from '../core/errors';
import { findZeroSumViolations } from '../core/zeroSum';
import { createStrategy } from '../search/strategy';
import {
  Board,
  CenterMassEvaluator,
  OpenLinesEvaluator,
  Placement,
  TicTacToeRule,
  emptyBoard,
  gameResult,
  parseBoard,
} from '../games/tictactoe';
import { formatGameRecord, formatSuggestion, formatVerification, PlayedTurn } from './output';
import { createLogger } from '../utils/logger';

const logger = createLogger('cli');
const rule = new TicTacToeRule();

export type EvaluatorName = 'ordinal' | 'numeric';

export interface SuggestOptions {
  board: string;
  actor: string;
  depth: number;
  variant: SearchVariant;
  pruning: boolean;
  evaluator: EvaluatorName;
  timeLimitMs?: number;
}

export interface PlayOptions {
  depth: number;
  variant: SearchVariant;
  pruning: boolean;
  evaluator: EvaluatorName;
  startingActor: string;
  board?: string;
}

export interface VerifyOptions {
  evaluator: EvaluatorName;
  samples: number;
  seed: number;
}

export function parseActor(value: string): Actor {
  const lower = value.toLowerCase().trim();
  if (isActor(lower)) return lower;
  throw new InvalidConfigError(`Unknown actor: "${value}". Valid actors: first, second`);
}

export function parseEvaluatorName(value: string): EvaluatorName {
  const lower = value.toLowerCase().trim();
  if (lower === 'ordinal' || lower === 'numeric') return lower;
  throw new InvalidConfigError(`Unknown evaluator: "${value}". Valid evaluators: ordinal, numeric`);
}

export function runSuggest(options: SuggestOptions): string {
  const board = parseBoard(options.board);
  const actor = parseActor(options.actor);
  return options.evaluator === 'numeric'
    ? suggestWith(new OpenLinesEvaluator(), board, actor, options)
    : suggestWith(new CenterMassEvaluator(), board, actor, options);
}

function suggestWith<P>(
  evaluator: Evaluator<Board, P>,
  board: Board,
  actor: Actor,
  options: SuggestOptions
): string {
  const strategy = createStrategy(rule, evaluator, {
    variant: options.variant,
    depth: options.depth,
    pruning: options.pruning,
    timeLimitMs: options.timeLimitMs,
  });

  logger.info(`Searching ${options.variant} to depth ${options.depth} for ${actor}`);
  const result = strategy.search(board, actor);
  const rankedActions = 'rankedActions' in result ? result.rankedActions : undefined;

  return formatSuggestion({
    board,
    actor,
    variant: options.variant,
    depth: options.depth,
    pruning: options.pruning,
    result,
    rankedActions,
    gameOver: gameResult(board) !== null,
  });
}

/**
 * Both actors use the same strategy until the game ends.
 */
export function runSelfPlay(options: PlayOptions): string {
  const start = options.board === undefined ? emptyBoard() : parseBoard(options.board);
  const startingActor = parseActor(options.startingActor);
  return options.evaluator === 'numeric'
    ? playWith(new OpenLinesEvaluator(), start, startingActor, options)
    : playWith(new CenterMassEvaluator(), start, startingActor, options);
}

function playWith<P>(
  evaluator: Evaluator<Board, P>,
  start: Board,
  startingActor: Actor,
  options: PlayOptions
): string {
  const strategy = createStrategy(rule, evaluator, {
    variant: options.variant,
    depth: options.depth,
    pruning: options.pruning,
  });

  const turns: PlayedTurn[] = [];
  let board = start;
  let actor = startingActor;

  while (!rule.isTerminal(board)) {
    const action: Placement | null = strategy.selectAction(board, actor);
    turns.push({ board, actor, action });
    if (action === null) {
      logger.warn(`${actor} has no action on an unfinished board`);
      break;
    }
    board = rule.apply(board, action);
    actor = opponent(actor);
  }

  return formatGameRecord(turns, board, gameResult(board));
}

export function runVerify(options: VerifyOptions): string {
  return options.evaluator === 'numeric'
    ? verifyWith(new OpenLinesEvaluator(), options)
    : verifyWith(new CenterMassEvaluator(), options);
}

function verifyWith<P>(evaluator: Evaluator<Board, P>, options: VerifyOptions): string {
  const violations = findZeroSumViolations(rule, evaluator, emptyBoard(), {
    samples: options.samples,
    seed: options.seed,
  });
  return formatVerification(options.evaluator, options.samples, violations);
}
