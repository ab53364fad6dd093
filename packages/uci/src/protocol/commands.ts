/**
 * Outbound UCI commands (GUI to engine)
 */

export type GoCommand =
  | { type: 'go'; depth: number }
  | { type: 'go'; infinite: true };

export type UciCommand =
  | { type: 'uci' }
  | { type: 'isready' }
  | { type: 'ucinewgame' }
  | { type: 'setoption'; name: string; value?: string }
  | { type: 'position'; fen?: string; moves: readonly string[] }
  | GoCommand
  | { type: 'stop' }
  | { type: 'quit' };

/**
 * Encode a command as a single protocol line (without the trailing newline)
 *
 * A `position` command without a FEN encodes as `position startpos`.
 */
export function encodeCommand(command: UciCommand): string {
  switch (command.type) {
    case 'uci':
    case 'isready':
    case 'ucinewgame':
    case 'stop':
    case 'quit':
      return command.type;

    case 'setoption':
      return command.value === undefined
        ? `setoption name ${command.name}`
        : `setoption name ${command.name} value ${command.value}`;

    case 'position': {
      const base = command.fen === undefined ? 'position startpos' : `position fen ${command.fen}`;
      return command.moves.length > 0 ? `${base} moves ${command.moves.join(' ')}` : base;
    }

    case 'go':
      return 'depth' in command ? `go depth ${command.depth}` : 'go infinite';
  }
}
