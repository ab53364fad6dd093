/**
 * @enginelens/uci - UCI chess-engine client
 *
 * Spawns an engine, runs the startup handshake and exposes searches as
 * cancellable async streams of analysis events.
 */

export const VERSION = '0.1.0';

export {
  UciClient,
  AnalysisSession,
  AnalysisStream,
  DEFAULT_UCI_OPTIONS,
  initialize,
  startupOptions,
  runReaderLoop,
  toAnalysisEvent,
  toCandidateLine,
  type UciClientOptions,
  type AnalyzeOptions,
  type HandshakeOptions,
} from './client/index.js';

export {
  EngineProcess,
  EngineHandle,
  LineReader,
  type EngineSpawnConfig,
  type EngineStreams,
  type EngineTransport,
} from './process/index.js';

export {
  encodeCommand,
  decodeLine,
  describeMessage,
  parseInfo,
  MATE_SCORE,
  mateToCentipawns,
  isMateScore,
  type UciCommand,
  type GoCommand,
  type UciMessage,
  type InfoMessage,
  type InfoScore,
  type BestMoveMessage,
  type IdMessage,
} from './protocol/index.js';

export { defaultLogger, silentLogger, type EngineLogger } from './logger.js';

export {
  UciClientError,
  StartupError,
  SpawnError,
  HandshakeError,
  ProtocolViolationError,
  EngineIOError,
  EngineClosedError,
  InvalidArgumentError,
  toError,
  type UciErrorCode,
  type HandshakeFailure,
} from './errors.js';
