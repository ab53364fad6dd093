/**
 * In-process UCI engine for testing
 *
 * Speaks the engine side of the protocol over a pair of PassThrough streams,
 * so a UciClient can be connected to it without spawning anything.
 */

import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';

import type { EngineTransport } from '@enginelens/uci';
import { Chess } from 'chess.js';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * The search the engine was asked to run
 */
export interface MockSearch {
  fen: string;
  moves: string[];
  /** Undefined for `go infinite` */
  depth?: number;
  multiPv: number;
}

/**
 * Lines the engine prints for one search
 */
export interface MockSearchResult {
  info: string[];
  bestmove: string;
}

export type SearchScript = (search: MockSearch) => MockSearchResult;

export interface MockEngineConfig {
  /** Lines printed before anything else in response to `uci` */
  banner?: string[];
  /** Identification lines */
  idLines?: string[];
  /** Lines between identification and `uciok` (options, chatter) */
  preamble?: string[];
  /** Reply to the n-th `isready`; `readyok` once exhausted */
  readyReplies?: string[];
  /** Never answer `uci` */
  silent?: boolean;
  /** Print `bestmove` only once `stop` arrives, even for a depth-limited search */
  holdBestMove?: boolean;
  /** Produces the output of each search; defaults to {@link legalMoveSearch} */
  search?: SearchScript;
}

function toMoveInput(uci: string): { from: string; to: string; promotion?: string } {
  const promotion = uci.slice(4, 5);
  return promotion
    ? { from: uci.slice(0, 2), to: uci.slice(2, 4), promotion }
    : { from: uci.slice(0, 2), to: uci.slice(2, 4) };
}

/**
 * Default search: ranks legal moves in generation order.
 *
 * Prints one `info string` line, then for each depth 1..N one line per
 * MultiPV slot, the k-th legal move scoring `40 - 15k` centipawns. The
 * best move is the first legal move. A position without legal moves
 * reports `mate 0` (checkmate) or `cp 0` (stalemate) and `bestmove (none)`.
 */
export function legalMoveSearch(search: MockSearch): MockSearchResult {
  const board = new Chess(search.fen);
  for (const move of search.moves) {
    board.move(toMoveInput(move));
  }

  const legal = board
    .moves({ verbose: true })
    .map((move) => `${move.from}${move.to}${move.promotion ?? ''}`);
  const first = legal[0];
  if (first === undefined) {
    const score = board.isCheckmate() ? 'mate 0' : 'cp 0';
    return { info: [`info depth 0 score ${score}`], bestmove: '(none)' };
  }

  const depth = search.depth ?? 3;
  const slots = Math.min(search.multiPv, legal.length);
  const info = [`info string ${legal.length} legal moves`];
  for (let d = 1; d <= depth; d++) {
    for (let k = 0; k < slots; k++) {
      info.push(
        `info depth ${d} seldepth ${d} multipv ${k + 1} score cp ${40 - 15 * k} nodes ${d * 1000} pv ${legal[k]}`,
      );
    }
  }
  return { info, bestmove: first };
}

/**
 * Fake UCI engine over in-memory streams
 */
export class MockUciEngine implements EngineTransport {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  /** Every command received, in order */
  readonly received: string[] = [];
  /** Values of `setoption` commands by option name */
  readonly options = new Map<string, string>();
  /** Searches started with `go` */
  readonly searches: MockSearch[] = [];

  private position: { fen: string; moves: string[] } = { fen: START_FEN, moves: [] };
  private readyCount = 0;
  private heldBestMove: string | null = null;
  private terminateCount = 0;

  constructor(private readonly config: MockEngineConfig = {}) {
    createInterface({ input: this.stdin }).on('line', (line) => this.handle(line.trim()));
  }

  /**
   * Commands received whose first word is `name`
   */
  commands(name: string): string[] {
    return this.received.filter((line) => line.split(' ')[0] === name);
  }

  get terminated(): number {
    return this.terminateCount;
  }

  /**
   * Print a raw line on the engine's output
   */
  emit(line: string): void {
    if (!this.stdout.writableEnded) {
      this.stdout.write(`${line}\n`);
    }
  }

  /**
   * Resolve once commands already written to the engine have been handled
   */
  async flush(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  /**
   * Close the engine's output as if the process had died
   */
  crash(): void {
    this.stdout.end();
  }

  async terminate(): Promise<void> {
    this.terminateCount++;
    this.stdin.end();
    this.stdout.end();
  }

  private handle(line: string): void {
    this.received.push(line);
    const [keyword = ''] = line.split(' ');

    switch (keyword) {
      case 'uci':
        if (!this.config.silent) {
          this.emitAll(this.config.banner ?? []);
          this.emitAll(this.config.idLines ?? ['id name MockEngine 1.0', 'id author enginelens']);
          this.emitAll(this.config.preamble ?? []);
          this.emit('uciok');
        }
        break;

      case 'isready':
        this.emit(this.config.readyReplies?.[this.readyCount] ?? 'readyok');
        this.readyCount++;
        break;

      case 'setoption': {
        const match = /^setoption name (.+?)(?: value (.*))?$/.exec(line);
        if (match?.[1] !== undefined) {
          this.options.set(match[1], match[2] ?? '');
        }
        break;
      }

      case 'position':
        this.position = this.parsePosition(line);
        break;

      case 'go':
        this.go(line);
        break;

      case 'stop':
        if (this.heldBestMove !== null) {
          this.emit(`bestmove ${this.heldBestMove}`);
          this.heldBestMove = null;
        }
        break;

      case 'quit':
        this.stdout.end();
        break;

      default:
        break;
    }
  }

  private parsePosition(line: string): { fen: string; moves: string[] } {
    const tokens = line.split(' ');
    const movesIndex = tokens.indexOf('moves');
    const moves = movesIndex === -1 ? [] : tokens.slice(movesIndex + 1);
    if (tokens[1] === 'fen') {
      const end = movesIndex === -1 ? tokens.length : movesIndex;
      return { fen: tokens.slice(2, end).join(' '), moves };
    }
    return { fen: START_FEN, moves };
  }

  private go(line: string): void {
    const tokens = line.split(' ');
    const depthIndex = tokens.indexOf('depth');
    const depthToken = depthIndex === -1 ? undefined : tokens[depthIndex + 1];
    const multiPv = Number.parseInt(this.options.get('MultiPV') ?? '1', 10);

    const search: MockSearch = {
      fen: this.position.fen,
      moves: this.position.moves,
      multiPv: Number.isNaN(multiPv) ? 1 : multiPv,
    };
    if (depthToken !== undefined) {
      search.depth = Number.parseInt(depthToken, 10);
    }
    this.searches.push(search);

    const result = (this.config.search ?? legalMoveSearch)(search);
    this.emitAll(result.info);

    if (search.depth === undefined || this.config.holdBestMove) {
      this.heldBestMove = result.bestmove;
    } else {
      this.emit(`bestmove ${result.bestmove}`);
    }
  }

  private emitAll(lines: readonly string[]): void {
    for (const line of lines) {
      this.emit(line);
    }
  }
}

/**
 * Create a fake UCI engine
 */
export function createMockEngine(config: MockEngineConfig = {}): MockUciEngine {
  return new MockUciEngine(config);
}
