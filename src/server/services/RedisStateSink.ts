import { GameSnapshot } from '../../shared/types/game';
import { logger } from '../utils/logger';
import { closeRedisClient, connectRedis } from '../cache/redis';
import { StateSink } from './StateNotifier';

/**
 * The subset of the redis client the mirror needs. Kept narrow so tests can
 * hand in an in-memory stand-in.
 */
export interface KeyValueWriter {
  set(key: string, value: string): Promise<unknown>;
  close?(): Promise<void>;
}

/**
 * Mirrors every snapshot into a single Redis key as JSON. Last write wins;
 * there is no durability guarantee beyond what Redis itself provides.
 */
export class RedisStateSink implements StateSink {
  readonly name = 'redis';
  private writes = 0;

  constructor(
    private readonly client: KeyValueWriter,
    private readonly key: string
  ) {}

  get writeCount(): number {
    return this.writes;
  }

  async write(snapshot: GameSnapshot): Promise<void> {
    await this.client.set(this.key, JSON.stringify(snapshot));
    this.writes++;
    logger.debug('Game state mirrored', { key: this.key, status: snapshot.status });
  }

  async close(): Promise<void> {
    if (this.client.close) {
      await this.client.close();
    }
  }
}

export interface RedisSinkTarget {
  url: string;
  key: string;
  password?: string;
}

/**
 * Opens (or replaces) the shared redis connection and wraps it as a sink.
 * Closing the sink quits its own connection only.
 */
export const connectRedisStateSink = async (target: RedisSinkTarget): Promise<RedisStateSink> => {
  const client = await connectRedis({ url: target.url, password: target.password });
  const writer: KeyValueWriter = {
    set: (key, value) => client.set(key, value),
    close: () => closeRedisClient(client),
  };
  logger.info('Redis state mirror attached', { key: target.key });
  return new RedisStateSink(writer, target.key);
};
