import {
  Board,
  GameSnapshot,
  GameStatus,
  Player,
  Seat,
  otherSeat,
  pieceForSeat,
  Piece,
} from '../../shared/types/game';
import {
  cloneBoard,
  createEmptyBoard,
  evaluateStatus,
  firstEmptyCell,
  isOnBoard,
  isTerminalStatus,
} from '../../shared/engine/boardStatus';
import {
  AlreadyRegisteredError,
  InvalidMoveError,
  InvalidStateTransitionError,
  PlayerNotFoundError,
} from '../../shared/errors';
import { RandomSource, coinFlip } from '../../shared/utils/rng';
import { StateNotifier, StateSink } from '../services/StateNotifier';
import { logger } from '../utils/logger';
import { PlayerQueue } from './PlayerQueue';
import { TurnWatchdog } from './TurnWatchdog';

export interface GameEngineOptions {
  /** Per-move time limit before an automatic move is placed. */
  moveTimeoutMs: number;
  /** Delay between a terminal board and the next round being seeded. */
  roundAdvanceDelayMs: number;
  /** Pending snapshots kept for a slow sink. */
  notificationBufferSize?: number;
  /** Coin used to pick the loser of a draw. Defaults to Math.random. */
  random?: RandomSource;
  sink?: StateSink | null;
}

const DEFAULT_NOTIFICATION_BUFFER = 100;

/**
 * Authoritative in-memory state of the single shared table.
 *
 * Concurrency model: every mutation below is synchronous and runs to
 * completion on the event loop, and the watchdog and the delayed round
 * advancement both re-enter through the same public methods. The event loop
 * is therefore the single mutual-exclusion domain for board, seats and queue;
 * a human move and a timeout can never interleave inside one mutation.
 *
 * Every successful mutation ends with a snapshot handed to the notifier,
 * which delivers it to the configured sink without blocking the caller.
 */
export class GameEngine {
  private board: Board | null = createEmptyBoard();
  private readonly queue = new PlayerQueue();
  private seatA: Player | null = null;
  private seatB: Player | null = null;
  private whoseTurn: Seat | null = null;
  private status: GameStatus = 'InsufficientPlayers';
  private round = 0;

  private watchdog: TurnWatchdog;
  private pendingAdvance: NodeJS.Timeout | null = null;
  private terminated = false;

  private readonly moveTimeoutMs: number;
  private readonly roundAdvanceDelayMs: number;
  private readonly random: RandomSource;
  private readonly notifier: StateNotifier;

  constructor(options: GameEngineOptions) {
    this.moveTimeoutMs = options.moveTimeoutMs;
    this.roundAdvanceDelayMs = options.roundAdvanceDelayMs;
    this.random = options.random ?? Math.random;
    this.notifier = new StateNotifier({
      bufferSize: options.notificationBufferSize ?? DEFAULT_NOTIFICATION_BUFFER,
    });
    if (options.sink) {
      this.notifier.setSink(options.sink);
    }
    this.watchdog = this.createWatchdog();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Players
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Seat A fills first, then seat B, then the back of the queue. Filling a
   * seat while the other one is empty makes it the first mover; filling the
   * second seat starts the round.
   */
  addPlayer(player: Player): void {
    const playerId = player.id;
    if (this.seatOf(playerId)) {
      logger.warn('Player already playing', { playerId });
      throw new AlreadyRegisteredError(playerId, 'seat');
    }
    if (this.queue.has(playerId)) {
      logger.warn('Player already registered', { playerId });
      throw new AlreadyRegisteredError(playerId, 'queue');
    }

    const record = { ...player };
    if (!this.seatA) {
      this.seatA = record;
      logger.info('Player seated', { playerId, seat: 'A' });
      this.onSeatFilled('A');
    } else if (!this.seatB) {
      this.seatB = record;
      logger.info('Player seated', { playerId, seat: 'B' });
      this.onSeatFilled('B');
    } else {
      this.queue.enqueue(record);
      logger.info('Player queued', { playerId, position: this.queue.length });
    }

    this.emitChange();
  }

  /**
   * Replace the stored record for `player.id`, searching seat A, seat B and
   * then the queue.
   */
  updatePlayer(player: Player): void {
    const playerId = player.id;
    const record = { ...player };

    if (this.seatA?.id === playerId) {
      this.seatA = record;
      logger.info('Player updated', { playerId, seat: 'A' });
    } else if (this.seatB?.id === playerId) {
      this.seatB = record;
      logger.info('Player updated', { playerId, seat: 'B' });
    } else {
      const index = this.queue.replace(record);
      if (index === -1) {
        logger.warn('Could not find player to update', { playerId });
        throw new PlayerNotFoundError(playerId);
      }
      logger.info('Player updated', { playerId, queuePosition: index });
    }

    this.emitChange();
  }

  /**
   * A seated player forfeits the board: the seat is vacated, the board is
   * cleared and the seat is backfilled from the queue head. A queued player
   * is simply spliced out.
   */
  removePlayer(playerId: string): void {
    const seat = this.seatOf(playerId);

    if (seat) {
      if (seat === 'A') {
        this.seatA = null;
      } else {
        this.seatB = null;
      }
      logger.info('Player removed from seat', { playerId, seat });
      this.cancelPendingAdvance();
      this.board = createEmptyBoard();
      this.backfillSeats();
      this.finishTransition();
      return;
    }

    if (!this.queue.remove(playerId)) {
      logger.warn('Player not playing or in queue', { playerId });
      throw new PlayerNotFoundError(playerId);
    }

    logger.info('Player removed from queue', { playerId });
    this.emitChange();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Moves
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Place the mover's mark at column `x`, row `y`.
   *
   * Moves are legal only while a round is in progress, only from the seat
   * holding the turn and only onto an empty cell. A terminal result
   * schedules the next round after the grace delay.
   */
  placeMove(playerId: string, x: number, y: number): void {
    const logContext = { playerId, x, y, status: this.status };

    if (this.status !== 'InProgress' || !this.board) {
      logger.warn('Move rejected: no round in progress', logContext);
      throw new InvalidMoveError(`No round in progress (status: ${this.status})`, logContext);
    }

    const seat = this.whoseTurn;
    const mover = seat ? this.occupant(seat) : null;
    if (!seat || !mover || mover.id !== playerId) {
      logger.warn("Move rejected: not player's turn", { ...logContext, whoseTurn: seat });
      throw new InvalidMoveError('Not your turn', { ...logContext, whoseTurn: seat });
    }

    if (!isOnBoard(x, y)) {
      logger.warn('Move rejected: position off board', logContext);
      throw new InvalidMoveError('Position is off the board', logContext);
    }

    if (this.board[y][x] !== Piece.Empty) {
      logger.warn('Move rejected: cell already used', logContext);
      throw new InvalidMoveError('Cell already occupied', logContext);
    }

    this.board[y][x] = pieceForSeat(seat);
    this.whoseTurn = otherSeat(seat);
    this.recomputeStatus();
    logger.info('Move placed', { ...logContext, seat, status: this.status });

    if (isTerminalStatus(this.status)) {
      this.watchdog.stop();
      this.scheduleAdvance();
    } else {
      this.watchdog.reset();
    }

    this.emitChange();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Rounds
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Drive the table to its next round according to the current status:
   *
   * - AWins: A keeps the seat, B's occupant rotates to the queue, B moves.
   * - BWins: symmetric.
   * - Draw: an unweighted coin picks the side that loses its seat; that
   *   side's replacement moves first.
   * - InProgress: fill any empty seat from the queue head.
   * - InsufficientPlayers: nothing to do.
   *
   * Any other status throws InvalidStateTransitionError.
   */
  advance(): void {
    switch (this.status) {
      case 'AWins':
        this.rotateLoser('B');
        break;
      case 'BWins':
        this.rotateLoser('A');
        break;
      case 'Draw':
        this.rotateLoser(coinFlip(this.random) ? 'A' : 'B');
        break;
      case 'InProgress':
        this.backfillSeats();
        break;
      case 'InsufficientPlayers':
        break;
      default:
        // Only NoBoard lands here, and the engine always holds a board.
        logger.error('No round transition for current status', { status: this.status });
        throw new InvalidStateTransitionError(this.status);
    }

    this.cancelPendingAdvance();
    this.finishTransition();
  }

  /**
   * Return the table to its just-constructed shape: empty board, no seats,
   * empty queue, fresh watchdog.
   */
  reset(): void {
    this.cancelPendingAdvance();
    this.watchdog.dispose();

    this.board = createEmptyBoard();
    this.queue.clear();
    this.seatA = null;
    this.seatB = null;
    this.whoseTurn = null;
    this.status = 'InsufficientPlayers';
    this.round++;
    this.watchdog = this.createWatchdog();

    logger.info('Table reset', { round: this.round });
    this.emitChange();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Accessors & lifecycle
  // ═══════════════════════════════════════════════════════════════════════

  getStatus(): GameStatus {
    return this.status;
  }

  snapshot(): GameSnapshot {
    return {
      board: this.board ? cloneBoard(this.board) : null,
      queue: this.queue.toArray(),
      playerA: this.seatA ? { ...this.seatA } : null,
      playerB: this.seatB ? { ...this.seatB } : null,
      whoseTurn: this.whoseTurn,
      status: this.status,
      moveTimeoutMs: this.moveTimeoutMs,
      round: this.round,
      updatedAt: new Date().toISOString(),
    };
  }

  /**
   * Attach (or detach with null) the persistence sink. The current state is
   * pushed immediately so the mirror starts in sync.
   */
  setStateSink(sink: StateSink | null): void {
    this.notifier.setSink(sink);
    if (sink) {
      this.emitChange();
    }
  }

  /**
   * Attach `sink` in place of the current one. The old sink is closed only
   * after its in-flight write finished and the pending snapshots, current
   * state included, were flushed into the new one. A failed close is logged.
   */
  async replaceStateSink(sink: StateSink): Promise<void> {
    const previous = this.notifier.setSink(sink);
    this.emitChange();
    await this.notifier.flush();

    if (!previous || previous === sink || !previous.close) {
      return;
    }
    try {
      await previous.close();
      logger.info('Previous state sink closed', { sink: previous.name });
    } catch (error) {
      logger.warn('Failed to close previous state sink', { sink: previous.name, error });
    }
  }

  hasStateSink(): boolean {
    return this.notifier.hasSink;
  }

  flushNotifications(): Promise<void> {
    return this.notifier.flush();
  }

  /**
   * Stop every timer owned by this engine. Further operations still work on
   * the in-memory state but no watchdog or delayed advancement will run.
   */
  terminate(): void {
    this.terminated = true;
    this.cancelPendingAdvance();
    this.watchdog.dispose();
    logger.info('Game engine terminated');
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════

  private createWatchdog(): TurnWatchdog {
    return new TurnWatchdog(() => this.placeAutomaticMove());
  }

  private startWatchdog(): void {
    if (!this.terminated) {
      this.watchdog.start(this.moveTimeoutMs);
    }
  }

  /**
   * Watchdog handler: move for whoever holds the turn on the first empty
   * cell in reading order. Failures are logged and swallowed; nobody is
   * waiting on this call.
   */
  private placeAutomaticMove(): void {
    const seat = this.status === 'InProgress' ? this.whoseTurn : null;
    const mover = seat ? this.occupant(seat) : null;
    if (!seat || !mover) {
      logger.error('Unable to make automatic move: could not find current player', {
        status: this.status,
        whoseTurn: this.whoseTurn,
      });
      return;
    }

    const cell = this.board ? firstEmptyCell(this.board) : null;
    if (!cell) {
      logger.error('Unable to make automatic move: no empty cell', { playerId: mover.id });
      return;
    }

    logger.info('Placing automatic move for player', { playerId: mover.id, seat, ...cell });
    try {
      this.placeMove(mover.id, cell.x, cell.y);
    } catch (error) {
      logger.error('Unable to place automatic move', { playerId: mover.id, ...cell, error });
    }
  }

  private onSeatFilled(seat: Seat): void {
    const other = otherSeat(seat);
    if (!this.occupant(other)) {
      this.whoseTurn = seat;
      return;
    }

    if (!this.whoseTurn) {
      this.whoseTurn = 'A';
    }
    this.round++;
    this.status = 'InProgress';
    this.startWatchdog();
    logger.info('Game starting', { round: this.round, whoseTurn: this.whoseTurn });
  }

  /**
   * The losing seat's occupant goes to the back of the queue and the queue
   * head takes the seat (the same player returns when nobody is waiting).
   */
  private rotateLoser(loser: Seat): void {
    const outgoing = this.occupant(loser);
    const incoming = this.queue.advance(outgoing);
    if (loser === 'A') {
      this.seatA = incoming;
    } else {
      this.seatB = incoming;
    }
    this.whoseTurn = loser;
    this.board = createEmptyBoard();
    this.round++;
    logger.info('Round finished, seat rotated', {
      status: this.status,
      seat: loser,
      outgoing: outgoing?.id,
      incoming: incoming?.id,
      round: this.round,
    });
  }

  private backfillSeats(): void {
    let filled = false;
    if (!this.seatA) {
      this.seatA = this.queue.advance();
      filled = this.seatA !== null;
    }
    if (!this.seatB) {
      this.seatB = this.queue.advance();
      filled = filled || this.seatB !== null;
    }
    if (filled && this.seatA && this.seatB) {
      this.round++;
    }
  }

  /**
   * Common tail of every round transition: watchdog restarted only when both
   * seats are filled, a lone occupant given the first move, status
   * recomputed, change emitted.
   */
  private finishTransition(): void {
    this.watchdog.stop();
    if (this.seatA && this.seatB) {
      if (!this.whoseTurn) {
        this.whoseTurn = 'A';
      }
      this.startWatchdog();
    } else if (this.seatA || this.seatB) {
      // The player left waiting was seated first, so opens the next round.
      this.whoseTurn = this.seatA ? 'A' : 'B';
    }
    this.recomputeStatus();
    logger.info('Board refreshed', { status: this.status, round: this.round });
    this.emitChange();
  }

  /**
   * Advance after the grace delay, but only if the round that produced the
   * terminal board is still the current one. A removal or reset in between
   * has already moved the table on.
   */
  private scheduleAdvance(): void {
    if (this.terminated) {
      return;
    }
    this.cancelPendingAdvance();
    const scheduledRound = this.round;
    logger.info('Game over, refreshing board', {
      status: this.status,
      delayMs: this.roundAdvanceDelayMs,
    });

    this.pendingAdvance = setTimeout(() => {
      this.pendingAdvance = null;
      if (this.round !== scheduledRound || !isTerminalStatus(this.status)) {
        logger.info('Skipping stale round advancement', {
          scheduledRound,
          round: this.round,
          status: this.status,
        });
        return;
      }
      try {
        this.advance();
      } catch (error) {
        logger.error('Error advancing round', { error, status: this.status });
      }
    }, this.roundAdvanceDelayMs);
  }

  private cancelPendingAdvance(): void {
    if (this.pendingAdvance) {
      clearTimeout(this.pendingAdvance);
      this.pendingAdvance = null;
    }
  }

  private recomputeStatus(): void {
    this.status = evaluateStatus({ board: this.board, seatA: this.seatA, seatB: this.seatB });
  }

  private occupant(seat: Seat): Player | null {
    return seat === 'A' ? this.seatA : this.seatB;
  }

  private seatOf(playerId: string): Seat | null {
    if (this.seatA?.id === playerId) return 'A';
    if (this.seatB?.id === playerId) return 'B';
    return null;
  }

  private emitChange(): void {
    this.notifier.notify(this.snapshot());
  }
}
