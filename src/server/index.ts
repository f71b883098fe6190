import { createServer } from 'http';
import { createApp } from './app';
import { GameEngine } from './game/GameEngine';
import { connectRedisStateSink } from './services/RedisStateSink';
import { disconnectRedis } from './cache/redis';
import { logger } from './utils/logger';
import { config } from './config';

const engine = new GameEngine({
  moveTimeoutMs: config.table.moveTimeoutMs,
  roundAdvanceDelayMs: config.table.roundAdvanceDelayMs,
  notificationBufferSize: config.table.notificationBufferSize,
});

const app = createApp({ engine });
const server = createServer(app);

async function startServer() {
  try {
    // The mirror is optional at startup. A failure leaves the table playable
    // and persistence can still be attached later through the API.
    if (config.redis.url) {
      try {
        const sink = await connectRedisStateSink({
          url: config.redis.url,
          key: config.redis.stateKey,
          password: config.redis.password,
        });
        engine.setStateSink(sink);
      } catch (redisError) {
        logger.warn('Redis connection failed; continuing without state mirror', {
          error: redisError instanceof Error ? redisError.message : String(redisError),
        });
      }
    }

    server.listen(config.server.port, config.server.host, () => {
      logger.info(`Server running on ${config.server.host}:${config.server.port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
      logger.info('Table configured', {
        moveTimeoutMs: config.table.moveTimeoutMs,
        roundAdvanceDelayMs: config.table.roundAdvanceDelayMs,
      });
    });

    process.on('SIGTERM', gracefulShutdown);
    process.on('SIGINT', gracefulShutdown);
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

function gracefulShutdown(signal: string) {
  logger.info(`Received ${signal}. Starting graceful shutdown...`);

  engine.terminate();

  server.close(() => {
    logger.info('HTTP server closed');

    engine
      .flushNotifications()
      .then(() => disconnectRedis())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error });
        process.exit(1);
      });
  });

  // Force close after 10 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 10000).unref();
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

void startServer();

export { app, server, engine };
