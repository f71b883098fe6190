import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { GameEngine } from '../game/GameEngine';
import { asyncHandler } from '../middleware/errorHandler';
import { MoveSchema, PlayerSchema, SubscribeSchema, UnsubscribeSchema } from '../../shared/validation/schemas';
import { Player } from '../../shared/types/game';

export const createPlayerRoutes = (engine: GameEngine): Router => {
  const router = Router();

  // Join the table: a free seat if there is one, otherwise the queue.
  router.post(
    '/subscribe',
    asyncHandler((req: Request, res: Response) => {
      const body = SubscribeSchema.parse(req.body ?? {});
      const player: Player = {
        id: body.id ?? uuidv4(),
        name: body.name ?? null,
      };

      engine.addPlayer(player);

      res.status(201).json({
        success: true,
        data: { id: player.id },
      });
    })
  );

  router.put(
    '/update',
    asyncHandler((req: Request, res: Response) => {
      const body = PlayerSchema.parse(req.body);

      engine.updatePlayer({ id: body.id, name: body.name ?? null });

      res.json({
        success: true,
        message: 'Player updated',
      });
    })
  );

  router.post(
    '/unsubscribe',
    asyncHandler((req: Request, res: Response) => {
      const { id } = UnsubscribeSchema.parse(req.body);

      engine.removePlayer(id);

      res.json({
        success: true,
        message: 'Player removed',
      });
    })
  );

  router.post(
    '/move',
    asyncHandler((req: Request, res: Response) => {
      const { playerId, x, y } = MoveSchema.parse(req.body);

      engine.placeMove(playerId, x, y);

      res.json({
        success: true,
        data: { game: engine.snapshot() },
      });
    })
  );

  return router;
};
