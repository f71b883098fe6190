/**
 * RedisStateSink / connectRedisStateSink tests. The redis client is replaced
 * by an in-memory key/value stand-in.
 */

const mockConnectRedis = jest.fn();
const mockCloseRedisClient = jest.fn();

jest.mock('../../src/server/cache/redis', () => ({
  connectRedis: (...args: unknown[]) => mockConnectRedis(...args),
  closeRedisClient: (...args: unknown[]) => mockCloseRedisClient(...args),
}));

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

import {
  KeyValueWriter,
  RedisStateSink,
  connectRedisStateSink,
} from '../../src/server/services/RedisStateSink';
import { GameSnapshot, Piece } from '../../src/shared/types/game';

class InMemoryStore implements KeyValueWriter {
  readonly values = new Map<string, string>();

  async set(key: string, value: string): Promise<string> {
    this.values.set(key, value);
    return 'OK';
  }
}

const snapshot: GameSnapshot = {
  board: [
    [Piece.MarkA, Piece.Empty, Piece.Empty],
    [Piece.Empty, Piece.MarkB, Piece.Empty],
    [Piece.Empty, Piece.Empty, Piece.Empty],
  ],
  queue: [{ id: 'p3', name: 'Cy' }],
  playerA: { id: 'p1' },
  playerB: { id: 'p2' },
  whoseTurn: 'A',
  status: 'InProgress',
  moveTimeoutMs: 5000,
  round: 1,
  updatedAt: '2024-01-01T00:00:00.000Z',
};

describe('RedisStateSink', () => {
  it('stores the snapshot as JSON under its key', async () => {
    const store = new InMemoryStore();
    const sink = new RedisStateSink(store, 'table:test');

    await sink.write(snapshot);

    expect(sink.name).toBe('redis');
    expect(sink.writeCount).toBe(1);
    expect(JSON.parse(store.values.get('table:test') ?? 'null')).toEqual(snapshot);
  });

  it('overwrites the previous value on each write', async () => {
    const store = new InMemoryStore();
    const sink = new RedisStateSink(store, 'table:test');

    await sink.write(snapshot);
    await sink.write({ ...snapshot, status: 'AWins', round: 2 });

    expect(store.values.size).toBe(1);
    expect(JSON.parse(store.values.get('table:test') ?? 'null').status).toBe('AWins');
    expect(sink.writeCount).toBe(2);
  });

  it('propagates write failures to the caller', async () => {
    const failing: KeyValueWriter = {
      set: async () => {
        throw new Error('READONLY');
      },
    };
    const sink = new RedisStateSink(failing, 'table:test');

    await expect(sink.write(snapshot)).rejects.toThrow('READONLY');
    expect(sink.writeCount).toBe(0);
  });
});

describe('connectRedisStateSink', () => {
  it('connects through the shared redis client and writes to the requested key', async () => {
    const store = new InMemoryStore();
    mockConnectRedis.mockResolvedValue(store);

    const sink = await connectRedisStateSink({
      url: 'redis://localhost:6379',
      key: 'table:mirror',
      password: 'test-password',
    });
    await sink.write(snapshot);

    expect(mockConnectRedis).toHaveBeenCalledWith({
      url: 'redis://localhost:6379',
      password: 'test-password',
    });
    expect(store.values.has('table:mirror')).toBe(true);
  });

  it('quits its own connection when closed', async () => {
    const store = new InMemoryStore();
    mockConnectRedis.mockResolvedValue(store);
    mockCloseRedisClient.mockResolvedValue(undefined);

    const sink = await connectRedisStateSink({ url: 'redis://localhost:6379', key: 'table:mirror' });
    await sink.close();

    expect(mockCloseRedisClient).toHaveBeenCalledTimes(1);
    expect(mockCloseRedisClient).toHaveBeenCalledWith(store);
  });

  it('surfaces connection errors', async () => {
    mockConnectRedis.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(
      connectRedisStateSink({ url: 'redis://localhost:6379', key: 'table:mirror' })
    ).rejects.toThrow('ECONNREFUSED');
  });
});
