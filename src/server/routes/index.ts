import { Router } from 'express';
import { GameEngine } from '../game/GameEngine';
import { createGameRoutes } from './game';
import { createPlayerRoutes } from './player';
import { createPersistenceRoutes, PersistenceRouteDefaults, StateSinkConnector } from './persistence';

export interface RouteDependencies {
  engine: GameEngine;
  connectStateSink: StateSinkConnector;
  persistenceDefaults: PersistenceRouteDefaults;
}

export const setupRoutes = ({ engine, connectStateSink, persistenceDefaults }: RouteDependencies): Router => {
  const router = Router();

  router.use('/game', createGameRoutes(engine));
  router.use('/players', createPlayerRoutes(engine));
  router.use('/persistence', createPersistenceRoutes(engine, connectStateSink, persistenceDefaults));

  // API info endpoint
  router.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Tic-Tac-Toe Table API',
      endpoints: {
        game: '/api/game',
        players: '/api/players',
        persistence: '/api/persistence',
      },
    });
  });

  return router;
};
