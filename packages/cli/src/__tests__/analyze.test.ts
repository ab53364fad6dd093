/**
 * Analyze command tests against an in-process engine
 */

import { createMockEngine, START_FEN, type MockUciEngine } from '@enginelens/test-utils';
import { silentLogger, UciClient } from '@enginelens/uci';
import { afterEach, describe, it, expect } from 'vitest';

import { printSummary, streamAnalysis } from '../commands/analyze.js';
import { resolvePosition } from '../position.js';
import { ProgressReporter } from '../progress/reporter.js';

const SCRIPTED_INFO = [
  'info depth 1 multipv 1 score cp 20 pv e7e5',
  'info depth 1 multipv 2 score cp 10 pv c7c5',
  'info string hello',
  'info depth 2 multipv 1 score cp 15 pv c7c5 g1f3',
  'info depth 2 multipv 2 score mate -3 pv e7e5',
];

describe('streamAnalysis', () => {
  let client: UciClient | undefined;
  const reporter = new ProgressReporter({ silent: true, color: false });

  afterEach(async () => {
    await client?.shutdown();
    client = undefined;
  });

  async function connect(engine: MockUciEngine, multiPv: number): Promise<UciClient> {
    client = await UciClient.connect(engine, { multiPv, logger: silentLogger });
    return client;
  }

  it('should print each line as it arrives and rank the final lines', async () => {
    const engine = createMockEngine({
      search: () => ({ info: SCRIPTED_INFO, bestmove: 'c7c5' }),
    });
    const output: string[] = [];

    const summary = await streamAnalysis(
      await connect(engine, 2),
      { position: resolvePosition(undefined, ['e4']), depth: 2, json: false },
      reporter,
      (line) => output.push(line),
    );

    expect(output).toEqual([
      'd1 [1] +0.20 e7e5',
      'd1 [2] +0.10 c7c5',
      'info hello',
      'd2 [1] +0.15 c7c5 g1f3',
      'd2 [2] #-3 e7e5',
    ]);
    expect(summary).toEqual({
      ranked: [
        { score: 15, move: 'c7c5', multiPv: 1 },
        { score: -99700, move: 'e7e5', multiPv: 2, mate: -3 },
      ],
      bestMove: 'c7c5',
      depth: 2,
    });
    expect(engine.searches).toEqual([{ fen: START_FEN, moves: ['e2e4'], depth: 2, multiPv: 2 }]);
  });

  it('should print events as JSON lines', async () => {
    const engine = createMockEngine({
      search: () => ({ info: SCRIPTED_INFO.slice(0, 1), bestmove: 'e7e5' }),
    });
    const output: string[] = [];

    await streamAnalysis(
      await connect(engine, 1),
      { position: resolvePosition(undefined, ['e4']), depth: 1, json: true },
      reporter,
      (line) => output.push(line),
    );

    expect(output).toEqual([
      '{"type":"candidate","depth":1,"score":20,"multiPv":1,"pv":["e7e5"]}',
      '{"type":"bestmove","move":"e7e5"}',
    ]);
  });

  it('should stop an unbounded search after the move time', async () => {
    const engine = createMockEngine();

    const summary = await streamAnalysis(
      await connect(engine, 2),
      { position: resolvePosition(undefined, []), depth: 18, movetimeMs: 50, json: false },
      reporter,
      () => undefined,
    );

    expect(engine.commands('go')).toEqual(['go infinite']);
    expect(engine.commands('stop')).toEqual(['stop']);
    expect(summary.bestMove).toBeUndefined();
    expect(summary.depth).toBe(3);
    expect(summary.ranked.map((entry) => entry.score)).toEqual([40, 25]);
  });
});

describe('printSummary', () => {
  const reporter = new ProgressReporter({ silent: true, color: false });

  it('should print the ranking under a heading', () => {
    const output: string[] = [];
    printSummary(
      {
        ranked: [
          { score: 15, move: 'c7c5', multiPv: 1 },
          { score: -99700, move: 'e7e5', multiPv: 2, mate: -3 },
        ],
        bestMove: 'c7c5',
        depth: 2,
      },
      reporter,
      (line) => output.push(line),
    );

    expect(output).toEqual(['', 'Candidates at depth 2:', '  1. c7c5  +0.15\n  2. e7e5  #-3']);
  });

  it('should say when there is nothing to rank', () => {
    const output: string[] = [];
    printSummary({ ranked: [], depth: 0 }, reporter, (line) => output.push(line));

    expect(output).toEqual(['', 'No candidate moves']);
  });
});
