/**
 * Core domain types for the rotating tic-tac-toe table.
 *
 * The board stores signed weights rather than symbols so that a completed
 * line can be detected from its sum alone: three MarkA pieces sum to -3,
 * three MarkB pieces to +3.
 */
export enum Piece {
  Empty = 0,
  MarkA = -1,
  MarkB = 1,
}

export const BOARD_SIZE = 3;

/** Board rows indexed `board[y][x]`. */
export type Board = Piece[][];

export type Seat = 'A' | 'B';

export interface Player {
  id: string;
  /** Display name; metadata only, never used for identity. */
  name?: string | null;
}

export interface Position {
  x: number;
  y: number;
}

/**
 * Game status. Exactly one value holds at any instant.
 *
 * - 'InsufficientPlayers' – at least one seat is empty.
 * - 'NoBoard'             – both seats filled but no board is attached.
 * - 'AWins' / 'BWins'     – three of that seat's marks in a line.
 * - 'Draw'                – board full, no line completed.
 * - 'InProgress'          – a round is being played.
 */
export type GameStatus = 'InsufficientPlayers' | 'NoBoard' | 'AWins' | 'BWins' | 'Draw' | 'InProgress';

export type TerminalStatus = Extract<GameStatus, 'AWins' | 'BWins' | 'Draw'>;

/**
 * Full serializable view of the table. Every field the engine owns is
 * present so that a persistence sink can mirror it verbatim.
 */
export interface GameSnapshot {
  board: Board | null;
  queue: Player[];
  playerA: Player | null;
  playerB: Player | null;
  whoseTurn: Seat | null;
  status: GameStatus;
  moveTimeoutMs: number;
  /** Monotonic counter bumped whenever a new round begins or the table resets. */
  round: number;
  updatedAt: string;
}

export const pieceForSeat = (seat: Seat): Piece => (seat === 'A' ? Piece.MarkA : Piece.MarkB);

export const otherSeat = (seat: Seat): Seat => (seat === 'A' ? 'B' : 'A');
