/**
 * Analysis types shared by the UCI client, the blunder evaluator and the CLI
 */

/**
 * Anything that can describe a board position in FEN.
 * A chess.js `Chess` instance satisfies this, as does a raw FEN string.
 */
export type PositionSource = string | { fen(): string };

/**
 * One principal variation reported by the engine (a UCI `info` message)
 */
export interface CandidateLine {
  type: 'candidate';
  /** Search depth in plies (0 when the engine omitted it) */
  depth: number;
  /** Centipawns from the side to move; mate scores use the mate sentinel */
  score: number;
  /** Moves to mate when the engine reported a mate score (negative: being mated) */
  mate?: number;
  /** Set when the engine reported no score at all; `score` is then 0 */
  unscored?: true;
  /** 1-based multi-PV slot */
  multiPv: number;
  /** Principal variation in UCI long algebraic notation */
  pv: string[];
  /** Free text from `info string` */
  text?: string;
}

/**
 * Terminal event of every analysis session
 */
export interface BestMove {
  type: 'bestmove';
  /** `(none)` when the side to move has no legal move */
  move: string;
  ponder?: string;
}

export type AnalysisEvent = CandidateLine | BestMove;

/**
 * A candidate first move with the score of its line
 */
export interface RankedMove {
  score: number;
  move: string;
  multiPv: number;
  mate?: number;
}

interface VerdictBase {
  /** Engine candidates for the original position, best first */
  rankedAlternatives: RankedMove[];
  /** Score of the proposed move, from the mover's point of view */
  evaluationOfProposedLine: number;
}

/**
 * The proposed move is one of the engine's own candidates
 */
export interface EngineLineVerdict extends VerdictBase {
  kind: 'engine-line';
  isBlunder: false;
}

/**
 * The proposed move was searched separately and compared with the best line
 */
export interface ComparedVerdict extends VerdictBase {
  kind: 'compared';
  isBlunder: boolean;
  /** Centipawns lost relative to the engine's best line (never negative) */
  centipawnLoss: number;
  /** Loss at or above which the move counts as a blunder */
  threshold: number;
  /** Opponent's strongest answer; absent when the proposed move leaves no legal reply */
  bestReply?: RankedMove;
}

export type BlunderVerdict = EngineLineVerdict | ComparedVerdict;
