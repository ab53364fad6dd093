export {
  UciClient,
  AnalysisSession,
  DEFAULT_UCI_OPTIONS,
  type UciClientOptions,
  type AnalyzeOptions,
} from './uci-client.js';
export { AnalysisStream } from './analysis-stream.js';
export { initialize, startupOptions, type HandshakeOptions } from './handshake.js';
export { runReaderLoop, toAnalysisEvent, toCandidateLine } from './reader-loop.js';
