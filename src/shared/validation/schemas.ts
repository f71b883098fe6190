import { z } from 'zod';
import { BOARD_SIZE } from '../types/game';

const PlayerIdSchema = z.string().trim().min(1, 'Player id is required').max(128);

const PlayerNameSchema = z.string().trim().max(64).nullable().optional();

// Subscribing without an id asks the server to generate one.
export const SubscribeSchema = z.object({
  id: PlayerIdSchema.optional(),
  name: PlayerNameSchema,
});

export const PlayerSchema = z.object({
  id: PlayerIdSchema,
  name: PlayerNameSchema,
});

export const UnsubscribeSchema = z.object({
  id: PlayerIdSchema,
});

export const CoordinateSchema = z.number().int().min(0).max(BOARD_SIZE - 1);

export const MoveSchema = z.object({
  playerId: PlayerIdSchema,
  x: CoordinateSchema,
  y: CoordinateSchema,
});

export const PersistenceInitSchema = z.object({
  url: z.string().url().optional(),
  key: z.string().min(1).max(256).optional(),
});
