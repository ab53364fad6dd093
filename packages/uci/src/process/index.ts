export { EngineProcess, type EngineSpawnConfig } from './engine-process.js';
export { EngineHandle, type EngineStreams, type EngineTransport } from './engine-handle.js';
export { LineReader } from './line-reader.js';
