import { createMockEngine } from '@enginelens/test-utils';
import { describe, it, expect, afterEach } from 'vitest';

import { startupOptions } from '../client/handshake.js';
import { UciClient } from '../client/uci-client.js';
import { HandshakeError, StartupError } from '../errors.js';
import { silentLogger } from '../logger.js';

describe('Handshake', () => {
  let client: UciClient | undefined;

  afterEach(async () => {
    await client?.shutdown();
    client = undefined;
  });

  describe('startupOptions', () => {
    it('should list the fixed options in order', () => {
      expect(startupOptions({ threads: 2, multiPv: 4 })).toEqual([
        { name: 'Threads', value: '2' },
        { name: 'UCI_AnalyseMode', value: 'true' },
        { name: 'MultiPV', value: '4' },
      ]);
    });
  });

  describe('initialize', () => {
    it('should reach the ready state through banner, id, options and two readyok', async () => {
      const engine = createMockEngine({
        banner: ['Mock engine 1.0 by the test suite'],
        preamble: ['option name Hash type spin default 16 min 1 max 1024', 'info string hello'],
      });

      client = await UciClient.connect(engine, { logger: silentLogger });

      expect(engine.received).toEqual([
        'uci',
        'isready',
        'ucinewgame',
        'setoption name Threads value 1',
        'setoption name UCI_AnalyseMode value true',
        'setoption name MultiPV value 3',
        'isready',
      ]);
    });

    it('should find an id line that follows banner text on the same line', async () => {
      const engine = createMockEngine({ idLines: ['Mock 2 ready id name Mock 2'] });

      client = await UciClient.connect(engine, { logger: silentLogger });

      expect(engine.commands('isready')).toHaveLength(2);
    });

    it('should send the configured option values', async () => {
      const engine = createMockEngine();

      client = await UciClient.connect(engine, { threads: 4, multiPv: 5, logger: silentLogger });

      expect(engine.options.get('Threads')).toBe('4');
      expect(engine.options.get('UCI_AnalyseMode')).toBe('true');
      expect(engine.options.get('MultiPV')).toBe('5');
      expect(client.options).toEqual({ threads: 4, multiPv: 5, handshakeTimeoutMs: 10000 });
    });

    it('should fail when the first isready is not answered with readyok', async () => {
      const engine = createMockEngine({ readyReplies: ['uciok'] });

      const error = await UciClient.connect(engine, { logger: silentLogger }).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(HandshakeError);
      expect(error).toMatchObject({ reason: 'unexpected-message', received: 'uciok' });
      expect(engine.commands('ucinewgame')).toEqual([]);
      expect(engine.terminated).toBe(1);
    });

    it('should fail when the second isready is not answered with readyok', async () => {
      const engine = createMockEngine({ readyReplies: ['readyok', 'bestmove e2e4'] });

      const error = await UciClient.connect(engine, { logger: silentLogger }).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(StartupError);
      expect(error).toMatchObject({
        reason: 'unexpected-message',
        received: 'bestmove e2e4',
        message: "Expected 'readyok' after setting options, got 'bestmove e2e4'",
      });
    });

    it('should time out when the engine never answers', async () => {
      const engine = createMockEngine({ silent: true });

      await expect(
        UciClient.connect(engine, { handshakeTimeoutMs: 50, logger: silentLogger }),
      ).rejects.toMatchObject({ name: 'HandshakeError', reason: 'timeout' });
      expect(engine.terminated).toBe(1);
    });

    it('should fail when the engine output closes during startup', async () => {
      const engine = createMockEngine({ silent: true });

      const pending = UciClient.connect(engine, { logger: silentLogger });
      engine.crash();

      await expect(pending).rejects.toMatchObject({
        name: 'HandshakeError',
        reason: 'stream-closed',
      });
    });
  });
});
