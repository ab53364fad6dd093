/**
 * @enginelens/test-utils
 *
 * In-process engine stand-ins shared by the package test suites
 */

export {
  createMockEngine,
  legalMoveSearch,
  MockUciEngine,
  START_FEN,
  type MockEngineConfig,
  type MockSearch,
  type MockSearchResult,
  type SearchScript,
} from './mocks/mock-engine.js';

export {
  bestMove,
  candidate,
  createMockAnalysisEngine,
  type AnalysisRequest,
  type AnalysisScript,
  type MockAnalysisEngine,
} from './mocks/mock-analysis-engine.js';
