/**
 * UCI line codec
 */

export { encodeCommand, type UciCommand, type GoCommand } from './commands.js';
export {
  decodeLine,
  describeMessage,
  parseInfo,
  type UciMessage,
  type InfoMessage,
  type InfoScore,
  type BestMoveMessage,
  type IdMessage,
} from './messages.js';
export { MATE_SCORE, mateToCentipawns, isMateScore } from './score.js';
