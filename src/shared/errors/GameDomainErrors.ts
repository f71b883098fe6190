/**
 * Domain errors raised by the table engine.
 *
 * Every engine operation either completes or throws one of these before
 * touching state, so callers can surface the failure and carry on. The
 * Express error handler turns `httpStatus` and `code` into the response.
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum GameErrorCode {
  GAME_INVALID_STATE = 'GAME_INVALID_STATE',
  MOVE_INVALID = 'MOVE_INVALID',
  PLAYER_NOT_FOUND = 'PLAYER_NOT_FOUND',
  PLAYER_ALREADY_REGISTERED = 'PLAYER_ALREADY_REGISTERED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export const ERROR_HTTP_STATUS: Record<GameErrorCode, number> = {
  [GameErrorCode.GAME_INVALID_STATE]: 409,
  [GameErrorCode.MOVE_INVALID]: 400,
  [GameErrorCode.PLAYER_NOT_FOUND]: 404,
  [GameErrorCode.PLAYER_ALREADY_REGISTERED]: 409,
  [GameErrorCode.INTERNAL_ERROR]: 500,
  [GameErrorCode.CONFIGURATION_ERROR]: 500,
};

export interface GameErrorJSON {
  error: true;
  code: GameErrorCode;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class GameError extends Error {
  readonly timestamp = new Date();

  constructor(
    readonly code: GameErrorCode,
    message: string,
    /** Ids, coordinates and status at the moment of failure. */
    readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'GameError';
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code];
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wrong turn, occupied or off-board cell, or a move while no round is in
 * progress.
 */
export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

export class PlayerNotFoundError extends GameError {
  constructor(playerId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.PLAYER_NOT_FOUND, `Player not found: ${playerId}`, {
      playerId,
      ...context,
    });
    this.name = 'PlayerNotFoundError';
    Object.setPrototypeOf(this, PlayerNotFoundError.prototype);
  }
}

/**
 * The id is already seated or waiting in the queue.
 */
export class AlreadyRegisteredError extends GameError {
  constructor(playerId: string, location: 'seat' | 'queue', context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.PLAYER_ALREADY_REGISTERED,
      location === 'seat' ? `Player ${playerId} is already playing` : `Player ${playerId} is already queued`,
      { playerId, location, ...context }
    );
    this.name = 'AlreadyRegisteredError';
    Object.setPrototypeOf(this, AlreadyRegisteredError.prototype);
  }
}

/**
 * Round advancement invoked while the table is in a status that has no
 * transition. Signals an internal sequencing bug rather than a user mistake.
 */
export class InvalidStateTransitionError extends GameError {
  constructor(status: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_INVALID_STATE, `No round transition from status ${status}`, {
      status,
      ...context,
    });
    this.name = 'InvalidStateTransitionError';
    Object.setPrototypeOf(this, InvalidStateTransitionError.prototype);
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
