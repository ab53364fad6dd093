/**
 * Multi-PV reconciliation: fold a session's candidate lines into ranked moves
 */

import type { AnalysisEvent, CandidateLine, RankedMove } from '@enginelens/types';

/**
 * What one drained session amounts to
 */
export interface SessionSummary {
  /** Latest line per multi-PV slot, best first */
  ranked: RankedMove[];
  /** Engine's final choice; undefined if the session ended without one */
  bestMove?: string;
  /**
   * Score of the last scored line without a principal variation, reported
   * by engines when the side to move has no legal move
   */
  terminalScore?: number;
  /** Deepest depth reported */
  depth: number;
}

/**
 * Order: score descending (side-to-move view), then multi-PV slot ascending
 */
export function compareRankedMoves(a: RankedMove, b: RankedMove): number {
  return b.score - a.score || a.multiPv - b.multiPv;
}

/**
 * Rank the latest line of each slot by its first move
 */
export function rankCandidates(lines: Iterable<CandidateLine>): RankedMove[] {
  const ranked: RankedMove[] = [];
  for (const line of lines) {
    const move = line.pv[0];
    if (move === undefined) {
      continue;
    }
    const entry: RankedMove = { score: line.score, move, multiPv: line.multiPv };
    if (line.mate !== undefined) {
      entry.mate = line.mate;
    }
    ranked.push(entry);
  }
  return ranked.sort(compareRankedMoves);
}

/**
 * Drain a session, keeping the latest line per slot.
 * Lines with an empty principal variation carry no move and are not ranked.
 */
export async function summarizeSession(
  session: AsyncIterable<AnalysisEvent>,
): Promise<SessionSummary> {
  const bySlot = new Map<number, CandidateLine>();
  const summary: SessionSummary = { ranked: [], depth: 0 };

  for await (const event of session) {
    if (event.type === 'bestmove') {
      summary.bestMove = event.move;
      continue;
    }
    summary.depth = Math.max(summary.depth, event.depth);
    if (event.pv.length > 0) {
      bySlot.set(event.multiPv, event);
    } else if (event.text === undefined && !event.unscored) {
      summary.terminalScore = event.score;
    }
  }

  summary.ranked = rankCandidates(bySlot.values());
  return summary;
}
