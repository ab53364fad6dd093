/**
 * Output formatting utilities
 */

import type { BlunderVerdict, CandidateLine, RankedMove } from '@enginelens/types';
import { isMateScore, MATE_SCORE } from '@enginelens/uci';
import chalk from 'chalk';

import type { EngineLensConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Build color functions, or identity functions when color is off
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Format a score in pawns ("+0.35", "-1.20", "0.00") or as a mate ("#3", "#-2")
 *
 * Without an explicit `mate`, sentinel scores are converted back to mate distances.
 */
export function formatScore(score: number, mate?: number): string {
  if (mate !== undefined) {
    return `#${mate}`;
  }
  if (isMateScore(score)) {
    const distance = score > 0 ? (MATE_SCORE - score) / 100 : (-MATE_SCORE - score) / 100;
    return `#${Math.round(distance)}`;
  }
  const pawns = (score / 100).toFixed(2);
  return score > 0 ? `+${pawns}` : pawns;
}

/**
 * One streamed candidate line: "d12 [1] +0.35 e2e4 e7e5"
 */
export function formatCandidate(line: CandidateLine, c: ColorFunctions): string {
  if (line.text !== undefined) {
    return c.dim(`info ${line.text}`);
  }
  const pv = line.pv.length > 0 ? ` ${line.pv.join(' ')}` : '';
  const score = formatScore(line.score, line.mate);
  return `${c.dim(`d${line.depth}`)} ${c.cyan(`[${line.multiPv}]`)} ${score}${pv}`;
}

/**
 * Ranked summary, best first: "  1. e2e4  +0.35"
 */
export function formatRanking(ranked: readonly RankedMove[], c: ColorFunctions): string {
  const width = Math.max(0, ...ranked.map((entry) => entry.move.length));
  return ranked
    .map((entry, index) => {
      const score = formatScore(entry.score, entry.mate);
      const line = `  ${index + 1}. ${entry.move.padEnd(width)}  ${score}`;
      return index === 0 ? c.bold(line) : line;
    })
    .join('\n');
}

/**
 * Verdict for a proposed move
 */
export function formatVerdict(move: string, verdict: BlunderVerdict, c: ColorFunctions): string {
  const lines: string[] = [];
  const evaluation = formatScore(verdict.evaluationOfProposedLine);

  if (verdict.kind === 'engine-line') {
    lines.push(`${c.bold(move)}: ${c.green('engine line')} (${evaluation})`);
  } else {
    const label = verdict.isBlunder ? c.red('blunder') : c.green('not a blunder');
    lines.push(`${c.bold(move)}: ${label} (${evaluation})`);
    lines.push(`  Loss: ${verdict.centipawnLoss}cp (threshold ${verdict.threshold}cp)`);
    const reply = verdict.bestReply;
    if (reply) {
      lines.push(`  Best reply: ${reply.move} (${formatScore(reply.score, reply.mate)})`);
    } else {
      lines.push('  Best reply: none (no legal move)');
    }
  }

  const best = verdict.rankedAlternatives[0];
  if (best) {
    lines.push(`  Engine best: ${best.move} (${formatScore(best.score, best.mate)})`);
  }
  return lines.join('\n');
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: EngineLensConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Engine:'));
  lines.push(`  Path: ${config.engine.path}`);
  if (config.engine.args.length > 0) {
    lines.push(`  Args: ${config.engine.args.join(' ')}`);
  }
  lines.push(`  Threads: ${config.engine.threads}`);
  lines.push(`  Multi-PV: ${config.engine.multiPv}`);
  lines.push(`  Handshake timeout: ${formatDuration(config.engine.handshakeTimeoutMs)}`);
  lines.push('');

  lines.push(chalk.dim('Analysis:'));
  lines.push(`  Depth: ${config.analysis.depth}`);
  lines.push('');

  lines.push(chalk.dim('Blunder check:'));
  if (config.blunder.thresholdCp !== undefined) {
    lines.push(`  Threshold: ${config.blunder.thresholdCp}cp`);
  } else if (config.blunder.rating !== undefined) {
    lines.push(`  Rating: ${config.blunder.rating}`);
  } else {
    lines.push(`  Threshold: ${chalk.yellow('default')}`);
  }

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
