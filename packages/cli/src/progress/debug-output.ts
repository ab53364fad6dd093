/**
 * Engine traffic output for debug mode
 */

import type { EngineLogger } from '@enginelens/uci';
import type { Ora } from 'ora';

import type { ColorFunctions } from './types.js';

/**
 * Logger handed to the UCI client. Debug lines reach stderr only in debug
 * mode; warnings always do. The spinner is paused around each write.
 */
export class DebugOutput implements EngineLogger {
  constructor(
    private readonly c: ColorFunctions,
    private readonly getSpinner: () => Ora | null,
    private readonly enabled: boolean,
  ) {}

  debug(message: string): void {
    if (!this.enabled) return;
    this.write(this.colorize(message));
  }

  warn(message: string): void {
    this.write(this.c.yellow(`⚠ ${message}`));
  }

  private colorize(message: string): string {
    if (message.startsWith('> ')) {
      return this.c.cyan(message);
    }
    if (message.startsWith('< ')) {
      return message;
    }
    return this.c.dim(message);
  }

  private write(line: string): void {
    const spinner = this.getSpinner();
    const spinnerText = spinner?.isSpinning ? spinner.text : undefined;
    if (spinnerText !== undefined) {
      spinner?.stop();
    }

    process.stderr.write(`${line}\n`);

    if (spinnerText !== undefined) {
      spinner?.start(spinnerText);
    }
  }
}
