import {
  bestMove,
  candidate,
  createMockAnalysisEngine,
  createMockEngine,
  START_FEN,
} from '@enginelens/test-utils';
import type { AnalysisEvent } from '@enginelens/types';
import { silentLogger, UciClient } from '@enginelens/uci';
import { InvalidArgumentError } from '@enginelens/uci/errors';
import { afterEach, describe, it, expect } from 'vitest';

import { BlunderEvaluator, centipawnLoss } from '../blunder/blunder-evaluator.js';
import { EvaluationError } from '../errors.js';

const FEN = 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2';

const ROOT_LINES: AnalysisEvent[] = [
  candidate(1, 30, ['g1f3', 'b8c6']),
  candidate(2, 20, ['f1c4']),
  candidate(1, 35, ['g1f3', 'g8f6']),
  bestMove('g1f3'),
];

/**
 * Engine that answers the root search with ROOT_LINES and any search after
 * a proposed move with `replies`
 */
function scriptedEngine(replies: AnalysisEvent[]) {
  return createMockAnalysisEngine(({ extraMoves }) =>
    extraMoves.length === 0 ? ROOT_LINES : replies,
  );
}

describe('BlunderEvaluator', () => {
  describe('evaluatePosition', () => {
    it('should rank the latest line of each slot', async () => {
      const evaluator = new BlunderEvaluator(scriptedEngine([]));
      const result = await evaluator.evaluatePosition(FEN, 7);

      expect(result.ranked).toEqual([
        { score: 35, move: 'g1f3', multiPv: 1 },
        { score: 20, move: 'f1c4', multiPv: 2 },
      ]);
      expect(result.best.move).toBe('g1f3');
      expect(result.bestMove).toBe('g1f3');
      expect(result.depth).toBe(10);
    });

    it('should accept anything with fen()', async () => {
      const engine = scriptedEngine([]);
      const evaluator = new BlunderEvaluator(engine);
      await evaluator.evaluatePosition({ fen: () => FEN }, 4);

      expect(engine.analyze).toHaveBeenCalledWith(FEN, [], 4);
    });

    it('should reject with EvaluationError when nothing can be ranked', async () => {
      const engine = createMockAnalysisEngine(() => [
        candidate(1, 0, [], { text: 'no lines' }),
        bestMove('e2e4'),
      ]);
      const evaluator = new BlunderEvaluator(engine);

      await expect(evaluator.evaluatePosition(FEN, 5)).rejects.toBeInstanceOf(EvaluationError);
    });
  });

  describe('checkForBlunder', () => {
    it('should accept one of the engine candidates without a second search', async () => {
      const engine = scriptedEngine([]);
      const evaluator = new BlunderEvaluator(engine);

      const verdict = await evaluator.checkForBlunder(FEN, 'f1c4', 7);

      expect(verdict).toEqual({
        kind: 'engine-line',
        isBlunder: false,
        rankedAlternatives: [
          { score: 35, move: 'g1f3', multiPv: 1 },
          { score: 20, move: 'f1c4', multiPv: 2 },
        ],
        evaluationOfProposedLine: 20,
      });
      expect(engine.analyze).toHaveBeenCalledTimes(1);
      expect(engine.analyze).toHaveBeenCalledWith(FEN, [], 7);
    });

    it('should flag a move whose refutation costs more than the threshold', async () => {
      const engine = scriptedEngine([
        candidate(1, 250, ['d8h4']),
        candidate(2, 100, ['b8c6']),
        bestMove('d8h4'),
      ]);
      const evaluator = new BlunderEvaluator(engine);

      const verdict = await evaluator.checkForBlunder(FEN, 'g2g4', 7);

      expect(verdict.kind).toBe('compared');
      expect(verdict.isBlunder).toBe(true);
      expect(verdict.evaluationOfProposedLine).toBe(-250);
      if (verdict.kind === 'compared') {
        expect(verdict.centipawnLoss).toBe(285);
        expect(verdict.threshold).toBe(200);
        expect(verdict.bestReply).toEqual({ score: 250, move: 'd8h4', multiPv: 1 });
      }
      expect(engine.analyze).toHaveBeenNthCalledWith(1, FEN, [], 7);
      expect(engine.analyze).toHaveBeenNthCalledWith(2, FEN, ['g2g4'], 7);
    });

    it('should not flag a loss below the threshold', async () => {
      const evaluator = new BlunderEvaluator(
        scriptedEngine([candidate(1, 100, ['b8c6']), bestMove('b8c6')]),
      );

      const verdict = await evaluator.checkForBlunder(FEN, 'b1c3', 7);

      expect(verdict.isBlunder).toBe(false);
      expect(verdict.evaluationOfProposedLine).toBe(-100);
      expect(verdict.kind === 'compared' && verdict.centipawnLoss).toBe(135);
    });

    it('should flag a loss exactly at the threshold', async () => {
      const evaluator = new BlunderEvaluator(
        scriptedEngine([candidate(1, 100, ['b8c6']), bestMove('b8c6')]),
        { thresholdCp: 135 },
      );

      const verdict = await evaluator.checkForBlunder(FEN, 'b1c3', 7);

      expect(verdict.isBlunder).toBe(true);
    });

    it('should use the rating band threshold', async () => {
      const evaluator = new BlunderEvaluator(
        scriptedEngine([candidate(1, 100, ['b8c6']), bestMove('b8c6')]),
        { rating: 2500 },
      );

      const verdict = await evaluator.checkForBlunder(FEN, 'b1c3', 7);

      expect(evaluator.threshold).toBe(100);
      expect(verdict.isBlunder).toBe(true);
    });

    it('should never report a negative loss', async () => {
      const evaluator = new BlunderEvaluator(
        scriptedEngine([candidate(1, -60, ['b8c6']), bestMove('b8c6')]),
      );

      const verdict = await evaluator.checkForBlunder(FEN, 'd2d4', 7);

      expect(verdict.evaluationOfProposedLine).toBe(60);
      expect(verdict.kind === 'compared' && verdict.centipawnLoss).toBe(0);
      expect(verdict.isBlunder).toBe(false);
    });

    it('should score a move that allows mate with the mate sentinel', async () => {
      const evaluator = new BlunderEvaluator(
        scriptedEngine([candidate(1, 99800, ['d8h4'], { mate: 2 }), bestMove('d8h4')]),
      );

      const verdict = await evaluator.checkForBlunder(FEN, 'f2f3', 7);

      expect(verdict.evaluationOfProposedLine).toBe(-99800);
      expect(verdict.kind === 'compared' && verdict.centipawnLoss).toBe(99835);
      expect(verdict.isBlunder).toBe(true);
    });

    it('should score a move that leaves no legal reply by the terminal line', async () => {
      const evaluator = new BlunderEvaluator(
        scriptedEngine([candidate(1, -100000, [], { depth: 0, mate: 0 }), bestMove('(none)')]),
      );

      const verdict = await evaluator.checkForBlunder(FEN, 'd1h5', 7);

      expect(verdict.evaluationOfProposedLine).toBe(100000);
      expect(verdict.isBlunder).toBe(false);
      expect(verdict.kind === 'compared' && verdict.bestReply).toBeUndefined();
    });

    it('should reject when the reply search yields nothing', async () => {
      const evaluator = new BlunderEvaluator(scriptedEngine([bestMove('b8c6')]));

      await expect(evaluator.checkForBlunder(FEN, 'b1c3', 7)).rejects.toBeInstanceOf(
        EvaluationError,
      );
    });

    it('should reject moves that are not in UCI notation', async () => {
      const engine = scriptedEngine([]);
      const evaluator = new BlunderEvaluator(engine);

      await expect(evaluator.checkForBlunder(FEN, 'Nf3', 7)).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
      expect(engine.analyze).not.toHaveBeenCalled();
    });
  });

  describe('with a UCI client', () => {
    let client: UciClient | undefined;

    afterEach(async () => {
      await client?.shutdown();
      client = undefined;
    });

    it("should not flag the engine's own top move at depth 7", async () => {
      client = await UciClient.connect(createMockEngine(), { multiPv: 3, logger: silentLogger });
      const evaluator = new BlunderEvaluator(client);

      const { best } = await evaluator.evaluatePosition(START_FEN, 7);
      const verdict = await evaluator.checkForBlunder(START_FEN, best.move, 7);

      expect(verdict.isBlunder).toBe(false);
      expect(verdict.kind).toBe('engine-line');
      expect(verdict.rankedAlternatives).toHaveLength(3);
    });

    it('should compare a move outside the candidate list', async () => {
      client = await UciClient.connect(createMockEngine(), { multiPv: 1, logger: silentLogger });
      const evaluator = new BlunderEvaluator(client);

      const verdict = await evaluator.checkForBlunder(START_FEN, 'h2h4', 3);

      expect(verdict.kind).toBe('compared');
      expect(verdict.evaluationOfProposedLine).toBe(-40);
      expect(verdict.kind === 'compared' && verdict.centipawnLoss).toBe(80);
      expect(verdict.isBlunder).toBe(false);
    });
  });

  describe('mating lines', () => {
    const MATE_FEN = 'r1bqkb1r/pppp1ppp/2n2n2/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR w KQkq - 4 4';

    function matingEngine(replies: AnalysisEvent[]) {
      return createMockAnalysisEngine(({ extraMoves }) =>
        extraMoves.length === 0
          ? [candidate(1, 99700, ['h5f7', 'e8e7', 'f7e8'], { mate: 3 }), bestMove('h5f7')]
          : replies,
      );
    }

    it('should not flag a move that delays a forced mate', async () => {
      const evaluator = new BlunderEvaluator(
        matingEngine([candidate(1, -99500, ['e8e7'], { mate: -5 }), bestMove('e8e7')]),
        { rating: 2500 },
      );

      const verdict = await evaluator.checkForBlunder(MATE_FEN, 'c4b5', 9);

      expect(verdict).toMatchObject({
        kind: 'compared',
        isBlunder: false,
        centipawnLoss: 0,
        evaluationOfProposedLine: 99500,
      });
    });

    it('should flag a move that gives up a forced mate', async () => {
      const evaluator = new BlunderEvaluator(
        matingEngine([candidate(1, -40, ['f6h5']), bestMove('f6h5')]),
      );

      const verdict = await evaluator.checkForBlunder(MATE_FEN, 'h5h3', 9);

      expect(verdict).toMatchObject({
        kind: 'compared',
        isBlunder: true,
        centipawnLoss: 99660,
        evaluationOfProposedLine: 40,
      });
    });
  });

  describe('centipawnLoss', () => {
    it('should be the score drop, never negative', () => {
      expect(centipawnLoss(35, -120)).toBe(155);
      expect(centipawnLoss(35, 60)).toBe(0);
    });

    it('should be zero when both lines mate for the mover', () => {
      expect(centipawnLoss(99700, 99500)).toBe(0);
    });

    it('should count the full drop when being mated instead', () => {
      expect(centipawnLoss(99700, -99800)).toBe(199500);
    });
  });
});
