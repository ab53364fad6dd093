/**
 * Blunder command implementation
 */

import { BlunderEvaluator, type BlunderEvaluatorOptions } from '@enginelens/core';
import type { BlunderVerdict } from '@enginelens/types';
import type { EngineLogger } from '@enginelens/uci';
import { Chess } from 'chess.js';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig, type BlunderConfigSchema } from '../config/index.js';
import { handleError } from '../errors/index.js';
import { withEngine } from '../orchestrator/services.js';
import { parseMoveList, resolvePosition, toUciMove, type ResolvedPosition } from '../position.js';
import { formatConfigDisplay, formatVerdict, ProgressReporter } from '../progress/index.js';

/**
 * A proposed move in a resolved position
 */
export interface BlunderCheck {
  position: ResolvedPosition;
  /** Proposed move in UCI notation */
  move: string;
}

/**
 * Resolve the position and convert the proposed move (SAN or UCI) to UCI notation
 *
 * @throws InputError for an invalid position or an illegal move
 */
export function prepareBlunderCheck(
  move: string,
  fen: string | undefined,
  moves: readonly string[],
): BlunderCheck {
  const position = resolvePosition(fen, moves);
  const scratch = new Chess(position.board.fen());
  return { position, move: toUciMove(scratch, move) };
}

/**
 * Evaluator options from the blunder section of the configuration
 */
export function evaluatorOptions(
  blunder: BlunderConfigSchema,
  logger: EngineLogger,
): BlunderEvaluatorOptions {
  const options: BlunderEvaluatorOptions = { logger };
  if (blunder.thresholdCp !== undefined) options.thresholdCp = blunder.thresholdCp;
  if (blunder.rating !== undefined) options.rating = blunder.rating;
  return options;
}

/**
 * Main blunder command handler
 */
export async function blunderCommand(
  move: string,
  fen: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    silent: options.json ?? false,
    color: !options.noColor,
    debug: options.debug ?? false,
  });

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    const check = prepareBlunderCheck(move, fen, parseMoveList(options.moves ?? ''));
    reporter.printHeader(VERSION);

    const verdict: BlunderVerdict = await withEngine(config, reporter, async (client) => {
      const evaluator = new BlunderEvaluator(
        client,
        evaluatorOptions(config.blunder, reporter.logger),
      );
      reporter.startSearch(`Checking ${check.move} at depth ${config.analysis.depth}`);
      const result = await evaluator.checkForBlunder(
        check.position.board,
        check.move,
        config.analysis.depth,
      );
      reporter.succeed(`Checked ${check.move}`);
      return result;
    });

    if (options.json) {
      console.log(JSON.stringify({ move: check.move, ...verdict }, null, 2));
    } else {
      console.log(formatVerdict(check.move, verdict, reporter.c));
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
