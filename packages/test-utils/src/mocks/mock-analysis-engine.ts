/**
 * Scripted analysis engine for evaluator tests
 *
 * Matches the `analyze` shape of UciClient without any protocol underneath.
 */

import type { AnalysisEvent, CandidateLine, PositionSource } from '@enginelens/types';
import { vi } from 'vitest';

export interface AnalysisRequest {
  fen: string;
  extraMoves: readonly string[];
  depthLimit: number | undefined;
}

export type AnalysisScript = (request: AnalysisRequest) => AnalysisEvent[];

/**
 * Build a candidate line
 */
export function candidate(
  multiPv: number,
  score: number,
  pv: string[],
  overrides: Partial<Omit<CandidateLine, 'type'>> = {},
): CandidateLine {
  return { type: 'candidate', depth: 10, score, multiPv, pv, ...overrides };
}

export function bestMove(move: string): AnalysisEvent {
  return { type: 'bestmove', move };
}

async function* replay(events: AnalysisEvent[]): AsyncGenerator<AnalysisEvent, void, undefined> {
  for (const event of events) {
    yield event;
  }
}

/**
 * Create an engine whose sessions replay `script`'s events.
 * `analyze` is a spy, so tests can assert on the requests.
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockAnalysisEngine(script: AnalysisScript) {
  const analyze = vi.fn(
    (
      position: PositionSource,
      extraMoves: readonly string[] = [],
      depthLimit?: number,
    ): AsyncIterable<AnalysisEvent> => {
      const fen = typeof position === 'string' ? position : position.fen();
      return replay(script({ fen, extraMoves: [...extraMoves], depthLimit }));
    },
  );

  return { analyze };
}

export type MockAnalysisEngine = ReturnType<typeof createMockAnalysisEngine>;
