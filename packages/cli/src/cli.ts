/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';

import type { CliOptions } from './config/schema.js';
import { InputError } from './errors/cli-errors.js';

export const VERSION = '0.1.0';

const THRESHOLD_HELP = `Centipawn loss at which a move is a blunder.
    Takes precedence over --rating; default 200`;

const RATING_HELP = `Player rating; picks a rating-band threshold
    (500cp below 1000 down to 100cp from 2400)`;

/**
 * Commander parser for positive integer option values
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Options shared by every command
 */
function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('-e, --engine <path>', 'UCI engine executable (default: stockfish)')
    .option('-m, --moves <moves>', 'Moves played from the position, SAN or UCI (e.g. "e4 e5 Nf3")')
    .option('-d, --depth <plies>', 'Search depth', parsePositiveInt)
    .option('--threads <n>', 'Engine search threads', parsePositiveInt)
    .option('--multipv <n>', 'Principal variations reported in parallel', parsePositiveInt)
    .option('--json', 'Print machine-readable JSON')
    .option('--debug', 'Print engine traffic to stderr')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('enginelens')
    .description('Stream UCI engine analysis and check moves for blunders')
    .version(VERSION);

  addCommonOptions(
    program
      .command('analyze')
      .description('Stream multi-PV analysis of a position (default: the start position)')
      .argument('[fen]', 'Position in FEN'),
  )
    .option('--movetime <ms>', 'Search without a depth limit for this long', parsePositiveInt)
    .action(async (fen: string | undefined, options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { analyzeCommand } = await import('./commands/analyze.js');
      await analyzeCommand(fen, options);
    });

  addCommonOptions(
    program
      .command('blunder')
      .description('Check whether a move loses too much against the engine best line')
      .argument('<move>', 'Proposed move, SAN or UCI')
      .argument('[fen]', 'Position in FEN'),
  )
    .option('-t, --threshold <cp>', THRESHOLD_HELP, parsePositiveInt)
    .option('-r, --rating <elo>', RATING_HELP, parsePositiveInt)
    .action(async (move: string, fen: string | undefined, options: Record<string, unknown>) => {
      const { blunderCommand } = await import('./commands/blunder.js');
      await blunderCommand(move, fen, options);
    });

  return program;
}

/**
 * Shape of the options object Commander hands to actions
 */
const commanderOptionsSchema = z.object({
  config: z.string().optional(),
  engine: z.string().optional(),
  moves: z.string().optional(),
  depth: z.number().optional(),
  threads: z.number().optional(),
  multipv: z.number().optional(),
  movetime: z.number().optional(),
  threshold: z.number().optional(),
  rating: z.number().optional(),
  json: z.boolean().optional(),
  debug: z.boolean().optional(),
  showConfig: z.boolean().optional(),
  // Commander.js uses 'color' (negated) when --no-color is used
  color: z.boolean().optional(),
});

/**
 * Parse CLI options from command options object
 *
 * @throws InputError when an option has the wrong type
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const parsed = commanderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new InputError(`Invalid options: ${details}`, 'Use --help to see available options');
  }

  const { color, ...rest } = parsed.data;
  const result: CliOptions = { ...rest };
  if (color === false) result.noColor = true;

  return result;
}
