/**
 * Blunder evaluator
 *
 * Compares a proposed move against the engine's candidates. When the move is
 * not one of them, a second search from the position after the move gives the
 * opponent's best reply, and the move is scored as the negation of it.
 */

import type {
  AnalysisEvent,
  BlunderVerdict,
  ComparedVerdict,
  PositionSource,
  RankedMove,
} from '@enginelens/types';
import { InvalidArgumentError } from '@enginelens/uci/errors';
import { defaultLogger, isMateScore, type EngineLogger } from '@enginelens/uci';

import { getBlunderThreshold } from '../classifier/thresholds.js';
import { EvaluationError } from '../errors.js';

import { summarizeSession } from './ranking.js';

/**
 * The part of UciClient the evaluator needs
 */
export interface AnalysisEngine {
  analyze(
    position: PositionSource,
    extraMoves?: readonly string[],
    depthLimit?: number,
  ): AsyncIterable<AnalysisEvent>;
}

export interface BlunderEvaluatorOptions {
  /** Fixed centipawn-loss threshold; takes precedence over `rating` */
  thresholdCp?: number;
  /** Player rating used to pick a rating-band threshold */
  rating?: number;
  logger?: EngineLogger;
}

/**
 * Ranked engine view of one position
 */
export interface PositionEvaluation {
  fen: string;
  /** Candidates, best first; never empty */
  ranked: RankedMove[];
  best: RankedMove;
  /** Engine's `bestmove` (may differ from `best.move` at low depth) */
  bestMove: string;
  depth: number;
}

const UCI_MOVE = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

function toFen(position: PositionSource): string {
  return typeof position === 'string' ? position : position.fen();
}

// Flip to the other side's view without producing -0
/**
 * Centipawns given up by playing a line scored `proposed` instead of `best`.
 * A move that still mates loses nothing, however much it delays the mate.
 */
export function centipawnLoss(best: number, proposed: number): number {
  if (best > 0 && proposed > 0 && isMateScore(best) && isMateScore(proposed)) {
    return 0;
  }
  return Math.max(0, best - proposed);
}

function negate(score: number): number {
  return 0 - score;
}

export class BlunderEvaluator {
  readonly threshold: number;
  private readonly logger: EngineLogger;

  constructor(
    private readonly engine: AnalysisEngine,
    options: BlunderEvaluatorOptions = {},
  ) {
    this.threshold = getBlunderThreshold(options);
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Search `position` to `depth` and rank the engine's candidates
   *
   * @throws EvaluationError if the search produced no ranked candidate
   */
  async evaluatePosition(
    position: PositionSource,
    depth: number,
    extraMoves: readonly string[] = [],
  ): Promise<PositionEvaluation> {
    const fen = toFen(position);
    const summary = await summarizeSession(this.engine.analyze(fen, extraMoves, depth));
    const best = summary.ranked[0];
    if (best === undefined) {
      throw new EvaluationError(
        `Engine reported no candidate moves (bestmove ${summary.bestMove ?? 'missing'})`,
        fen,
        extraMoves,
      );
    }
    return {
      fen,
      ranked: summary.ranked,
      best,
      bestMove: summary.bestMove ?? best.move,
      depth: summary.depth,
    };
  }

  /**
   * Decide whether `proposedMove` (UCI notation) is a blunder in `position`
   *
   * The two searches run one after the other, each drained completely.
   */
  async checkForBlunder(
    position: PositionSource,
    proposedMove: string,
    depth: number,
  ): Promise<BlunderVerdict> {
    if (!UCI_MOVE.test(proposedMove)) {
      throw new InvalidArgumentError(`Not a UCI move: '${proposedMove}'`);
    }

    const before = await this.evaluatePosition(position, depth);
    const candidate = before.ranked.find((entry) => entry.move === proposedMove);
    if (candidate) {
      return {
        kind: 'engine-line',
        isBlunder: false,
        rankedAlternatives: before.ranked,
        evaluationOfProposedLine: candidate.score,
      };
    }

    this.logger.debug(`${proposedMove} is not an engine candidate, searching replies`);
    const reply = await this.searchReply(before.fen, proposedMove, depth);

    const evaluation = negate(reply.score);
    const loss = centipawnLoss(before.best.score, evaluation);
    const verdict: ComparedVerdict = {
      kind: 'compared',
      isBlunder: loss >= this.threshold,
      centipawnLoss: loss,
      threshold: this.threshold,
      rankedAlternatives: before.ranked,
      evaluationOfProposedLine: evaluation,
    };
    if (reply.best) {
      verdict.bestReply = reply.best;
    }
    return verdict;
  }

  /**
   * Search the position after `move`; a position without replies is scored
   * by the engine's terminal line
   */
  private async searchReply(
    fen: string,
    move: string,
    depth: number,
  ): Promise<{ best?: RankedMove; score: number }> {
    const summary = await summarizeSession(this.engine.analyze(fen, [move], depth));
    const best = summary.ranked[0];
    if (best) {
      return { best, score: best.score };
    }
    if (summary.bestMove === '(none)' && summary.terminalScore !== undefined) {
      return { score: summary.terminalScore };
    }
    throw new EvaluationError(
      `Engine reported no reply to ${move} (bestmove ${summary.bestMove ?? 'missing'})`,
      fen,
      [move],
    );
  }
}
