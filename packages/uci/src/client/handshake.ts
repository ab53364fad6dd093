/**
 * Handshake coordinator: drives a freshly started engine to the ready state
 */

import { EngineIOError, HandshakeError, StartupError, toError } from '../errors.js';
import type { EngineLogger } from '../logger.js';
import type { EngineHandle } from '../process/engine-handle.js';
import { decodeLine, describeMessage, type UciMessage } from '../protocol/index.js';

export interface HandshakeOptions {
  /** Value of the `Threads` option */
  threads: number;
  /** Value of the `MultiPV` option */
  multiPv: number;
  /** Upper bound for the whole sequence (ms) */
  timeoutMs: number;
}

/**
 * Identification line, possibly preceded by banner text on the same line
 */
const ID_PATTERN = /(?:^|\s)(id\s.*)$/;

/**
 * The fixed option list sent after `ucinewgame`
 */
export function startupOptions(options: Pick<HandshakeOptions, 'threads' | 'multiPv'>): Array<{
  name: string;
  value: string;
}> {
  return [
    { name: 'Threads', value: String(options.threads) },
    { name: 'UCI_AnalyseMode', value: 'true' },
    { name: 'MultiPV', value: String(options.multiPv) },
  ];
}

async function receive(handle: EngineHandle): Promise<UciMessage> {
  return decodeLine(await receiveLine(handle));
}

async function receiveLine(handle: EngineHandle): Promise<string> {
  try {
    return await handle.receiveLine();
  } catch (error) {
    const cause = toError(error);
    throw new HandshakeError(
      'stream-closed',
      `Engine output ended during startup: ${cause.message}`,
      undefined,
      cause instanceof EngineIOError ? cause : undefined,
    );
  }
}

/**
 * Skip banner output until the first `id` line
 */
async function readIdentification(
  handle: EngineHandle,
  logger: EngineLogger,
): Promise<UciMessage> {
  for (;;) {
    const line = await receiveLine(handle);
    const match = ID_PATTERN.exec(line);
    if (match?.[1] !== undefined) {
      return decodeLine(match[1]);
    }
    logger.debug(`skipping banner: ${line}`);
  }
}

/**
 * Send `isready` and require `readyok` as the very next message
 */
async function confirmReady(handle: EngineHandle, stage: string): Promise<void> {
  handle.send({ type: 'isready' });
  const reply = await receive(handle);
  if (reply.type !== 'readyok') {
    const received = describeMessage(reply);
    throw new HandshakeError(
      'unexpected-message',
      `Expected 'readyok' ${stage}, got '${received}'`,
      received,
    );
  }
}

async function performHandshake(
  handle: EngineHandle,
  options: HandshakeOptions,
  logger: EngineLogger,
): Promise<void> {
  handle.send({ type: 'uci' });

  let message = await readIdentification(handle, logger);
  while (message.type !== 'uciok') {
    if (message.type === 'id' && message.field === 'name') {
      logger.debug(`engine identified as ${message.value}`);
    }
    message = await receive(handle);
  }

  await confirmReady(handle, 'after uciok');

  handle.send({ type: 'ucinewgame' });
  for (const option of startupOptions(options)) {
    handle.send({ type: 'setoption', name: option.name, value: option.value });
  }

  // Options are not acknowledged individually; this round trip confirms them
  await confirmReady(handle, 'after setting options');
}

/**
 * Run the startup sequence
 *
 * @throws HandshakeError on an unexpected reply, end of stream or timeout
 */
export async function initialize(
  handle: EngineHandle,
  options: HandshakeOptions,
  logger: EngineLogger,
): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new HandshakeError('timeout', `Engine did not become ready within ${options.timeoutMs}ms`),
      );
    }, options.timeoutMs);
  });

  try {
    await Promise.race([performHandshake(handle, options, logger), timeout]);
  } catch (error) {
    if (error instanceof StartupError) {
      throw error;
    }
    throw new HandshakeError(
      'stream-closed',
      `Engine startup failed: ${toError(error).message}`,
      undefined,
      error,
    );
  } finally {
    clearTimeout(timer);
  }
}
