/**
 * Inbound UCI messages (engine to GUI) and the line decoder
 */

export type InfoScore =
  | { kind: 'cp'; value: number; lowerbound?: boolean; upperbound?: boolean }
  | { kind: 'mate'; value: number; lowerbound?: boolean; upperbound?: boolean };

/**
 * Parsed `info` line. Every attribute is optional; engines send any subset.
 */
export interface InfoMessage {
  type: 'info';
  depth?: number;
  seldepth?: number;
  multiPv?: number;
  score?: InfoScore;
  nodes?: number;
  nps?: number;
  time?: number;
  hashfull?: number;
  currmove?: string;
  currmoveNumber?: number;
  pv?: string[];
  string?: string;
}

export interface BestMoveMessage {
  type: 'bestmove';
  move: string;
  ponder?: string;
}

export interface IdMessage {
  type: 'id';
  field: 'name' | 'author' | 'other';
  value: string;
}

export type UciMessage =
  | IdMessage
  | { type: 'uciok' }
  | { type: 'readyok' }
  | InfoMessage
  | BestMoveMessage
  | { type: 'option'; raw: string }
  | { type: 'unknown'; raw: string };

/**
 * Parse an integer token, ignoring anything that is not a number
 */
function parseInteger(token: string | undefined): number | undefined {
  if (token === undefined) {
    return undefined;
  }
  const value = Number.parseInt(token, 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Parse the attribute list of an `info` line
 *
 * Example input (tokens after `info`):
 * "depth 24 seldepth 32 multipv 1 score cp 35 nodes 12345678 nps 2500000 time 4938 pv e2e4 e7e5"
 */
export function parseInfo(tokens: readonly string[]): InfoMessage {
  const info: InfoMessage = { type: 'info' };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    switch (token) {
      case 'depth':
        info.depth = parseInteger(tokens[++i]);
        break;

      case 'seldepth':
        info.seldepth = parseInteger(tokens[++i]);
        break;

      case 'multipv':
        info.multiPv = parseInteger(tokens[++i]);
        break;

      case 'score': {
        const kind = tokens[i + 1];
        const value = parseInteger(tokens[i + 2]);
        if ((kind === 'cp' || kind === 'mate') && value !== undefined) {
          info.score = { kind, value };
          i += 2;
        } else {
          i += 1;
        }
        // Bounds follow the value
        while (tokens[i + 1] === 'lowerbound' || tokens[i + 1] === 'upperbound') {
          if (info.score && tokens[i + 1] === 'lowerbound') {
            info.score.lowerbound = true;
          } else if (info.score) {
            info.score.upperbound = true;
          }
          i++;
        }
        break;
      }

      case 'nodes':
        info.nodes = parseInteger(tokens[++i]);
        break;

      case 'nps':
        info.nps = parseInteger(tokens[++i]);
        break;

      case 'time':
        info.time = parseInteger(tokens[++i]);
        break;

      case 'hashfull':
        info.hashfull = parseInteger(tokens[++i]);
        break;

      case 'currmove':
        info.currmove = tokens[++i];
        break;

      case 'currmovenumber':
        info.currmoveNumber = parseInteger(tokens[++i]);
        break;

      case 'pv':
        // PV runs to the end of the line
        info.pv = tokens.slice(i + 1);
        i = tokens.length;
        break;

      case 'string':
        info.string = tokens.slice(i + 1).join(' ');
        i = tokens.length;
        break;

      default:
        // Unknown token (tbhits, cpuload, refutation...), skip
        break;
    }
    i++;
  }

  return info;
}

/**
 * Decode one line of engine output
 *
 * Lines the codec does not recognise decode as `unknown` rather than throwing;
 * it is up to the caller to decide whether they are allowed.
 */
export function decodeLine(line: string): UciMessage {
  const trimmed = line.trim();
  const tokens = trimmed.split(/\s+/).filter((token) => token.length > 0);
  const keyword = tokens[0];

  switch (keyword) {
    case 'id': {
      const field = tokens[1];
      const value = tokens.slice(2).join(' ');
      return {
        type: 'id',
        field: field === 'name' || field === 'author' ? field : 'other',
        value: field === 'name' || field === 'author' ? value : tokens.slice(1).join(' '),
      };
    }

    case 'uciok':
      return { type: 'uciok' };

    case 'readyok':
      return { type: 'readyok' };

    case 'info':
      return parseInfo(tokens.slice(1));

    case 'bestmove': {
      const move = tokens[1];
      if (move === undefined) {
        return { type: 'unknown', raw: trimmed };
      }
      const message: BestMoveMessage = { type: 'bestmove', move };
      if (tokens[2] === 'ponder' && tokens[3] !== undefined) {
        message.ponder = tokens[3];
      }
      return message;
    }

    case 'option':
      return { type: 'option', raw: trimmed };

    default:
      return { type: 'unknown', raw: trimmed };
  }
}

/**
 * Render a decoded message for logs and error messages
 */
export function describeMessage(message: UciMessage): string {
  switch (message.type) {
    case 'option':
    case 'unknown':
      return message.raw;
    case 'id':
      return message.field === 'other' ? `id ${message.value}` : `id ${message.field} ${message.value}`;
    case 'bestmove':
      return message.ponder ? `bestmove ${message.move} ponder ${message.ponder}` : `bestmove ${message.move}`;
    case 'info':
      return 'info';
    default:
      return message.type;
  }
}
