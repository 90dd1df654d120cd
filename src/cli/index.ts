#!/usr/bin/env node
/**
 * duelsearch CLI entry point.
 *
 * Commands:
 *   suggest   Best action for one actor on a given tic-tac-toe board
 *   play      Let the engine play both sides from a board to the end
 *   verify    Check a board evaluator against the zero-sum law
 *
 * Usage:
 *   duelsearch suggest --board "F--/-S-/---" --actor first --depth 9
 *   duelsearch play --variant negamax --depth 9
 *   duelsearch verify --evaluator numeric --samples 500 --seed 7
 *
 * Options:
 *   --depth            Plies searched below each candidate action
 *   --variant          minimax or negamax (default: minimax)
 *   --no-pruning       Disable alpha-beta pruning
 *   --evaluator        ordinal (centre mass) or numeric (open lines)
 *   --time-limit       Abort a search after this many milliseconds
 *   --verbose          Enable detailed logging
 */
import { Command, InvalidArgumentError } from 'commander';
import { SearchVariant } from '../core/types';
import { DEFAULT_SEARCH_DEPTH } from '../search/config';
import { parseVariant } from '../search/strategy';
import { enableVerbose, createLogger } from '../utils/logger';
import {
  EvaluatorName,
  parseEvaluatorName,
  runSelfPlay,
  runSuggest,
  runVerify,
} from './commands';

const logger = createLogger('cli');
const program = new Command();

interface SearchCliOptions {
  depth: number;
  variant: SearchVariant;
  pruning: boolean;
  evaluator: EvaluatorName;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function asArgument<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

function withSearchOptions(command: Command): Command {
  return command
    .option('--depth <plies>', 'Plies searched below each candidate action', parseInteger, DEFAULT_SEARCH_DEPTH)
    .option('--variant <variant>', 'Search variant: minimax or negamax', asArgument(parseVariant), 'minimax')
    .option('--no-pruning', 'Disable alpha-beta pruning')
    .option('--evaluator <name>', 'Board evaluator: ordinal or numeric', asArgument(parseEvaluatorName), 'ordinal')
    .option('--verbose', 'Enable detailed logging');
}

/**
 * Runs a command body, printing its output or the error and exiting.
 */
function run(verbose: boolean | undefined, body: () => string): void {
  if (verbose) {
    enableVerbose();
  }
  try {
    console.log(body());
    process.exitCode = 0;
  } catch (error) {
    if (verbose) {
      console.error('Error:', error);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = 1;
  }
}

program
  .name('duelsearch')
  .description('Two-player game move search using minimax with alpha-beta pruning')
  .version('1.0.0');

withSearchOptions(
  program
    .command('suggest')
    .description('Suggest the best action for an actor on a tic-tac-toe board')
    .requiredOption('--board <cells>', 'Board as 9 cells of F, S or -, e.g. "F--/-S-/---"')
    .requiredOption('--actor <actor>', 'Actor to move: first or second')
    .option('--time-limit <ms>', 'Abort the search after this many milliseconds', parseInteger)
).action((options: SearchCliOptions & { board: string; actor: string; timeLimit?: number }) => {
  run(options.verbose, () => {
    logger.debug({ options }, 'suggest');
    return runSuggest({
      board: options.board,
      actor: options.actor,
      depth: options.depth,
      variant: options.variant,
      pruning: options.pruning,
      evaluator: options.evaluator,
      timeLimitMs: options.timeLimit,
    });
  });
});

withSearchOptions(
  program
    .command('play')
    .description('Let the engine play both actors until the game ends')
    .option('--board <cells>', 'Starting board (default: empty)')
    .option('--starting-actor <actor>', 'Actor who moves first', 'first')
).action((options: SearchCliOptions & { board?: string; startingActor: string }) => {
  run(options.verbose, () => {
    logger.debug({ options }, 'play');
    return runSelfPlay({
      depth: options.depth,
      variant: options.variant,
      pruning: options.pruning,
      evaluator: options.evaluator,
      startingActor: options.startingActor,
      board: options.board,
    });
  });
});

program
  .command('verify')
  .description('Check that a board evaluator satisfies the zero-sum law')
  .option('--evaluator <name>', 'Board evaluator: ordinal or numeric', asArgument(parseEvaluatorName), 'ordinal')
  .option('--samples <count>', 'Number of positions to sample', parseInteger, 200)
  .option('--seed <seed>', 'Random seed for sampling', parseInteger, 1)
  .option('--verbose', 'Enable detailed logging')
  .action((options: { evaluator: EvaluatorName; samples: number; seed: number; verbose?: boolean }) => {
    run(options.verbose, () =>
      runVerify({ evaluator: options.evaluator, samples: options.samples, seed: options.seed })
    );
  });

program.parse(process.argv);
