/**
 * Progress reporter with ora spinners
 */

import type { CandidateLine } from '@enginelens/types';
import type { EngineLogger } from '@enginelens/uci';
import ora, { type Ora, type Color } from 'ora';

import { DebugOutput } from './debug-output.js';
import { createColorFns, formatDuration, formatScore } from './formatters.js';
import type { ColorFunctions, ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI status output. Everything goes to stderr so
 * stdout carries only results.
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly debugOutput: DebugOutput;

  readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
    this.debugOutput = new DebugOutput(this.c, () => this.spinner, options.debug ?? false);
  }

  /**
   * Logger for the UCI client
   */
  get logger(): EngineLogger {
    return this.debugOutput;
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    process.stderr.write(`${this.c.bold(`enginelens v${version}`)}\n`);
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    this.debugOutput.warn(message);
  }

  /**
   * Show a spinner while the engine starts
   */
  startEngine(enginePath: string): void {
    this.startTime = Date.now();
    this.startSpinner(`Starting ${enginePath}`);
  }

  /**
   * Engine finished its handshake
   */
  engineReady(enginePath: string): void {
    if (this.silent || !this.spinner) return;
    this.spinner.succeed(`${enginePath} ready ${this.elapsed()}`);
    this.spinner = null;
  }

  /**
   * Show a spinner for a search
   */
  startSearch(label: string): void {
    this.startTime = Date.now();
    this.startSpinner(label);
  }

  /**
   * Reflect the latest candidate line in the spinner text
   */
  updateSearch(label: string, line: CandidateLine): void {
    if (this.silent || !this.spinner || line.pv.length === 0) return;
    const score = formatScore(line.score, line.mate);
    this.spinner.text = `${label} ${this.c.dim(`depth ${line.depth}`)} ${score}`;
  }

  /**
   * Stop the spinner, marking the step as done
   */
  succeed(message: string): void {
    if (this.silent || !this.spinner) return;
    this.spinner.succeed(`${message} ${this.elapsed()}`);
    this.spinner = null;
  }

  /**
   * Stop the spinner, marking the step as failed
   */
  fail(message: string): void {
    if (!this.spinner) return;
    this.spinner.fail(message);
    this.spinner = null;
  }

  /**
   * Stop any spinner without a status symbol
   */
  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  private elapsed(): string {
    return this.c.dim(`(${formatDuration(Date.now() - this.startTime)})`);
  }

  private startSpinner(text: string): void {
    if (this.silent) return;
    this.spinner?.stop();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; stream: NodeJS.WritableStream; color?: Color } = {
      text,
      stream: process.stderr,
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }
}
