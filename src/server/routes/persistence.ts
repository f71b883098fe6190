import { Router, Request, Response } from 'express';
import { GameEngine } from '../game/GameEngine';
import { StateSink } from '../services/StateNotifier';
import { asyncHandler, createError } from '../middleware/errorHandler';
import { PersistenceInitSchema } from '../../shared/validation/schemas';
import { logger } from '../utils/logger';

export interface StateSinkTarget {
  url: string;
  key: string;
}

export type StateSinkConnector = (target: StateSinkTarget) => Promise<StateSink>;

export interface PersistenceRouteDefaults {
  url?: string;
  key: string;
}

/**
 * Attaches the persistence mirror. Until this runs (or REDIS_URL is set at
 * startup) the table still plays, its changes are just not mirrored.
 */
export const createPersistenceRoutes = (
  engine: GameEngine,
  connect: StateSinkConnector,
  defaults: PersistenceRouteDefaults
): Router => {
  const router = Router();

  router.post(
    '/init',
    asyncHandler(async (req: Request, res: Response) => {
      const body = PersistenceInitSchema.parse(req.body ?? {});
      const url = body.url ?? defaults.url;
      const key = body.key ?? defaults.key;

      if (!url) {
        throw createError('A Redis URL is required to initialise persistence', 400, 'INVALID_REQUEST');
      }

      logger.info('Initialising state persistence', { key });
      let sink: StateSink;
      try {
        sink = await connect({ url, key });
      } catch (error) {
        logger.error('Unable to initialise state persistence', { key, error });
        throw createError('Unable to connect to persistence store', 503, 'PERSISTENCE_UNAVAILABLE');
      }

      await engine.replaceStateSink(sink);

      res.json({
        success: true,
        data: { sink: sink.name, key },
        message: 'Persistence initialised',
      });
    })
  );

  return router;
};
