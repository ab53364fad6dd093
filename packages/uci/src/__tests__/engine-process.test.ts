import { describe, it, expect, vi } from 'vitest';

import { UciClient } from '../client/uci-client.js';
import { HandshakeError, SpawnError } from '../errors.js';
import type { EngineLogger } from '../logger.js';
import { EngineProcess } from '../process/engine-process.js';

const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

// Child processes run on the current node binary so the tests need no engine installed
const IDLE_SCRIPT = 'setInterval(() => {}, 1000);';

const EXIT_ON_EOF_SCRIPT = `
process.stdin.resume();
process.stdin.on('end', () => process.exit(0));
`;

const STUB_ENGINE_SCRIPT = `
const readline = require('node:readline');
const rl = readline.createInterface({ input: process.stdin });
rl.on('line', (line) => {
  if (line === 'uci') process.stdout.write('id name StubEngine\\nuciok\\n');
  else if (line === 'isready') process.stdout.write('readyok\\n');
  else if (line.startsWith('go')) process.stdout.write('info depth 1 multipv 1 score cp 12 pv e2e4\\nbestmove e2e4\\n');
  else if (line === 'quit') process.exit(0);
});
`;

function nodeScript(script: string): { enginePath: string; args: string[] } {
  return { enginePath: process.execPath, args: ['-e', script] };
}

function recordingLogger(): EngineLogger & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    debug: (message) => messages.push(message),
    warn: vi.fn(),
  };
}

function spawnedPid(messages: readonly string[]): number {
  for (const message of messages) {
    const match = /^spawned .* \(pid (\d+)\)$/.exec(message);
    if (match?.[1]) {
      return Number(match[1]);
    }
  }
  throw new Error('no spawn message was logged');
}

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe('EngineProcess', () => {
  it('should reject with SpawnError when the executable does not exist', async () => {
    const start = UciClient.start({
      enginePath: '/nonexistent/enginelens-engine',
      logger: recordingLogger(),
    });

    await expect(start).rejects.toBeInstanceOf(SpawnError);
    await expect(start).rejects.toMatchObject({
      code: 'SPAWN_FAILED',
      enginePath: '/nonexistent/enginelens-engine',
    });
  });

  it('should time out the handshake with a silent child and terminate it', async () => {
    const logger = recordingLogger();
    const start = UciClient.start({
      ...nodeScript(IDLE_SCRIPT),
      handshakeTimeoutMs: 300,
      terminateGraceMs: 100,
      logger,
    });

    await expect(start).rejects.toBeInstanceOf(HandshakeError);
    await expect(start).rejects.toMatchObject({ reason: 'timeout' });
    expect(isRunning(spawnedPid(logger.messages))).toBe(false);
  });

  it('should kill a child that ignores end of input once the grace period has passed', async () => {
    const engine = await EngineProcess.spawn(
      { ...nodeScript(IDLE_SCRIPT), terminateGraceMs: 100 },
      recordingLogger(),
    );
    expect(engine.exited).toBe(false);

    const startedAt = Date.now();
    await engine.terminate();

    expect(engine.exited).toBe(true);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(90);
  });

  it('should log a child error raised after the spawn instead of throwing it', async () => {
    const logger = recordingLogger();
    const engine = await EngineProcess.spawn(
      { ...nodeScript(IDLE_SCRIPT), terminateGraceMs: 100 },
      logger,
    );

    try {
      expect(() => engine['child'].emit('error', new Error('kill EPERM'))).not.toThrow();
      expect(logger.warn).toHaveBeenCalledWith('engine process error: kill EPERM');
    } finally {
      await engine.terminate();
    }
  });

  it('should let a child that exits on end of input stop without being killed', async () => {
    const engine = await EngineProcess.spawn(
      { ...nodeScript(EXIT_ON_EOF_SCRIPT), terminateGraceMs: 10000 },
      recordingLogger(),
    );

    await engine.terminate();

    expect(engine.exited).toBe(true);
  });

  it('should run a session against a real subprocess and quit it on shutdown', async () => {
    const logger = recordingLogger();
    const client = await UciClient.start({
      ...nodeScript(STUB_ENGINE_SCRIPT),
      handshakeTimeoutMs: 5000,
      terminateGraceMs: 1000,
      logger,
    });

    const events = await client.analyze(START_FEN, [], 1).collect();
    await client.shutdown();

    expect(events).toEqual([
      { type: 'candidate', depth: 1, score: 12, multiPv: 1, pv: ['e2e4'] },
      { type: 'bestmove', move: 'e2e4' },
    ]);
    expect(logger.messages).toContain('> quit');
    expect(isRunning(spawnedPid(logger.messages))).toBe(false);
  });
});
