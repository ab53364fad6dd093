/**
 * enginelens CLI - UCI engine analysis and blunder checks
 *
 * Main entry point for the enginelens command-line interface.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION, createProgram, parseCliOptions } from './cli.js';

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    const program = createProgram();
    await program.parseAsync(argv);
  } catch (error) {
    handleError(error);
  }
}
