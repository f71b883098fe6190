import {
  BOARD_SIZE,
  Board,
  GameStatus,
  Piece,
  Player,
  Position,
  TerminalStatus,
} from '../types/game';

const A_WINS_SUM = Piece.MarkA * BOARD_SIZE;
const B_WINS_SUM = Piece.MarkB * BOARD_SIZE;
const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

export interface StatusInput {
  board: Board | null;
  seatA: Player | null;
  seatB: Player | null;
}

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () =>
    Array.from({ length: BOARD_SIZE }, () => Piece.Empty)
  );
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => [...row]);
}

export function isOnBoard(x: number, y: number): boolean {
  return (
    Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < BOARD_SIZE && y >= 0 && y < BOARD_SIZE
  );
}

export function isTerminalStatus(status: GameStatus): status is TerminalStatus {
  return status === 'AWins' || status === 'BWins' || status === 'Draw';
}

function lineResult(sum: number): TerminalStatus | null {
  if (sum === A_WINS_SUM) return 'AWins';
  if (sum === B_WINS_SUM) return 'BWins';
  return null;
}

/**
 * Side-effect free status evaluator.
 *
 * Seats take precedence over the board: with either seat empty the table is
 * 'InsufficientPlayers' whatever the board holds. Otherwise rows are scanned
 * top to bottom, then columns, then both diagonals, and the first line whose
 * weights reach ±3 decides the winner. Only one mark can occupy a completed
 * line, so scan order never changes the outcome.
 */
export function evaluateStatus({ board, seatA, seatB }: StatusInput): GameStatus {
  if (!seatA || !seatB) {
    return 'InsufficientPlayers';
  }

  if (!board) {
    return 'NoBoard';
  }

  let filled = 0;
  for (const row of board) {
    let rowSum = 0;
    for (const cell of row) {
      if (cell !== Piece.Empty) {
        filled++;
      }
      rowSum += cell;
    }
    const result = lineResult(rowSum);
    if (result) return result;
  }

  for (let x = 0; x < BOARD_SIZE; x++) {
    let colSum = 0;
    for (let y = 0; y < BOARD_SIZE; y++) {
      colSum += board[y][x];
    }
    const result = lineResult(colSum);
    if (result) return result;
  }

  let diagonal = 0;
  let antiDiagonal = 0;
  for (let i = 0; i < BOARD_SIZE; i++) {
    diagonal += board[i][i];
    antiDiagonal += board[BOARD_SIZE - 1 - i][i];
  }
  const diagonalResult = lineResult(diagonal) ?? lineResult(antiDiagonal);
  if (diagonalResult) return diagonalResult;

  return filled === CELL_COUNT ? 'Draw' : 'InProgress';
}

/**
 * First empty cell in reading order (left to right, top to bottom), or null
 * when the board is full.
 */
export function firstEmptyCell(board: Board): Position | null {
  for (let y = 0; y < board.length; y++) {
    for (let x = 0; x < board[y].length; x++) {
      if (board[y][x] === Piece.Empty) {
        return { x, y };
      }
    }
  }
  return null;
}
