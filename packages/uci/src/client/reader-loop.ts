/**
 * Reader loop: turns the engine's post-`go` output into analysis events
 */

import type { AnalysisEvent, CandidateLine } from '@enginelens/types';

import { ProtocolViolationError, toError } from '../errors.js';
import type { EngineLogger } from '../logger.js';
import type { EngineHandle } from '../process/engine-handle.js';
import {
  describeMessage,
  mateToCentipawns,
  type InfoMessage,
  type UciMessage,
} from '../protocol/index.js';

import type { AnalysisStream } from './analysis-stream.js';

/**
 * Map one `info` message to a candidate line.
 *
 * Each field is read from this message alone; anything missing takes its
 * default (depth 0, score 0, slot 1, empty PV). A line without a score is
 * marked `unscored`.
 */
export function toCandidateLine(info: InfoMessage): CandidateLine {
  const line: CandidateLine = {
    type: 'candidate',
    depth: info.depth ?? 0,
    score: 0,
    multiPv: info.multiPv ?? 1,
    pv: info.pv ?? [],
  };

  if (info.score?.kind === 'cp') {
    line.score = info.score.value;
  } else if (info.score?.kind === 'mate') {
    line.score = mateToCentipawns(info.score.value);
    line.mate = info.score.value;
  } else {
    line.unscored = true;
  }

  if (info.string !== undefined) {
    line.text = info.string;
  }

  return line;
}

/**
 * Map a message received during a search to an analysis event
 *
 * @throws ProtocolViolationError for anything other than `info` or `bestmove`
 */
export function toAnalysisEvent(message: UciMessage): AnalysisEvent {
  switch (message.type) {
    case 'info':
      return toCandidateLine(message);
    case 'bestmove':
      return message.ponder === undefined
        ? { type: 'bestmove', move: message.move }
        : { type: 'bestmove', move: message.move, ponder: message.ponder };
    default:
      throw new ProtocolViolationError(describeMessage(message));
  }
}

/**
 * Read until `bestmove`, publishing every event to `stream`.
 *
 * If the consumer cancels, `stop` is written exactly once and reading carries
 * on until the engine's `bestmove`, so the next session starts in step with
 * the engine. Read failures and protocol violations fail the stream; this
 * function itself never rejects.
 */
export async function runReaderLoop(
  handle: EngineHandle,
  stream: AnalysisStream,
  logger: EngineLogger,
): Promise<void> {
  let stopSent = false;

  const requestStop = (): void => {
    if (stopSent) {
      return;
    }
    stopSent = true;
    logger.debug('consumer cancelled, stopping search');
    try {
      handle.send({ type: 'stop' });
    } catch (error) {
      // The read side reports the broken stream on the next receive
      logger.debug(`could not send stop: ${toError(error).message}`);
    }
  };

  stream.onCancel(requestStop);

  for (;;) {
    let event: AnalysisEvent;
    try {
      event = toAnalysisEvent(await handle.receive());
    } catch (error) {
      const failure = toError(error);
      if (failure instanceof ProtocolViolationError) {
        // Framing is lost; later sessions on this handle cannot be trusted
        handle.markBroken(failure);
      }
      stream.fail(failure);
      return;
    }

    if (!stream.push(event) && event.type !== 'bestmove') {
      requestStop();
    }

    if (event.type === 'bestmove') {
      stream.end();
      return;
    }
  }
}
