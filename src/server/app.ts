import express, { Express } from 'express';
import { setupRoutes } from './routes';
import { StateSinkConnector } from './routes/persistence';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestContext } from './middleware/requestContext';
import { securityMiddleware } from './middleware/securityHeaders';
import { GameEngine } from './game/GameEngine';
import { connectRedisStateSink } from './services/RedisStateSink';
import { config } from './config';

export interface AppDependencies {
  engine: GameEngine;
  /** Overrides how POST /api/persistence/init obtains a sink. */
  connectStateSink?: StateSinkConnector;
}

const defaultConnector: StateSinkConnector = (target) =>
  connectRedisStateSink({ ...target, password: config.redis.password });

export const createApp = ({ engine, connectStateSink = defaultConnector }: AppDependencies): Express => {
  const app = express();

  app.use(securityMiddleware.headers);
  app.use(securityMiddleware.cors);

  // Correlation ids must exist before any route or the error handler logs.
  app.use(requestContext);

  app.use(express.json({ limit: '16kb' }));

  app.get(['/health', '/healthz'], (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.app.version,
      uptime: process.uptime(),
      table: {
        status: engine.getStatus(),
        persistence: engine.hasStateSink(),
      },
    });
  });

  app.use(
    '/api',
    setupRoutes({
      engine,
      connectStateSink,
      persistenceDefaults: { url: config.redis.url, key: config.redis.stateKey },
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
