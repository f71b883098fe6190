import { Router, Request, Response } from 'express';
import { GameEngine } from '../game/GameEngine';
import { logger } from '../utils/logger';

/**
 * Table-wide routes: read the full state, reset the table.
 */
export const createGameRoutes = (engine: GameEngine): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: { game: engine.snapshot() },
    });
  });

  router.post('/reset', (_req: Request, res: Response) => {
    engine.reset();
    logger.info('Table reset requested');

    res.json({
      success: true,
      data: { game: engine.snapshot() },
      message: 'Table reset',
    });
  });

  return router;
};
