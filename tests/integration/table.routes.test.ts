/**
 * HTTP surface of the table, exercised through supertest against an
 * in-process app. Persistence uses a recording sink instead of Redis.
 */

import request from 'supertest';

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
  runWithContext: (_context: unknown, fn: () => void) => fn(),
}));

import { Express } from 'express';
import { createApp } from '../../src/server/app';
import { GameEngine } from '../../src/server/game/GameEngine';
import { StateSink } from '../../src/server/services/StateNotifier';
import { StateSinkTarget } from '../../src/server/routes/persistence';
import { GameSnapshot, Piece } from '../../src/shared/types/game';

class RecordingSink implements StateSink {
  readonly name = 'recording';
  readonly snapshots: GameSnapshot[] = [];

  async write(snapshot: GameSnapshot): Promise<void> {
    this.snapshots.push(snapshot);
  }
}

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('table routes', () => {
  let engine: GameEngine;
  let app: Express;
  let sink: RecordingSink;
  let connectStateSink: jest.Mock<Promise<StateSink>, [StateSinkTarget]>;

  beforeEach(() => {
    engine = new GameEngine({ moveTimeoutMs: 60_000, roundAdvanceDelayMs: 60_000 });
    sink = new RecordingSink();
    connectStateSink = jest.fn<Promise<StateSink>, [StateSinkTarget]>(async () => sink);
    app = createApp({ engine, connectStateSink });
  });

  afterEach(() => {
    engine.terminate();
  });

  const seat = async (id: string) => {
    await request(app).post('/api/players/subscribe').send({ id }).expect(201);
  };

  describe('GET /health', () => {
    it('reports liveness and the table status', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.body.status).toBe('healthy');
      expect(res.body.table).toEqual({ status: 'InsufficientPlayers', persistence: false });
    });
  });

  describe('players', () => {
    it('seats a subscriber under the supplied id', async () => {
      const res = await request(app)
        .post('/api/players/subscribe')
        .send({ id: 'p1', name: 'Ann' })
        .expect(201);

      expect(res.body).toEqual({ success: true, data: { id: 'p1' } });
      expect(engine.snapshot().playerA).toEqual({ id: 'p1', name: 'Ann' });
    });

    it('generates an id when none is supplied', async () => {
      const res = await request(app).post('/api/players/subscribe').send({}).expect(201);

      expect(res.body.data.id).toMatch(UUID_V4);
      expect(engine.snapshot().playerA?.id).toBe(res.body.data.id);
    });

    it('answers 409 for a duplicate subscription', async () => {
      await seat('p1');

      const res = await request(app).post('/api/players/subscribe').send({ id: 'p1' }).expect(409);

      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('PLAYER_ALREADY_REGISTERED');
      expect(res.body.error.message).toBe('Player p1 is already playing');
    });

    it('updates a queued player', async () => {
      await seat('p1');
      await seat('p2');
      await seat('p3');

      await request(app).put('/api/players/update').send({ id: 'p3', name: 'Cy' }).expect(200);

      expect(engine.snapshot().queue).toEqual([{ id: 'p3', name: 'Cy' }]);
    });

    it('answers 404 when updating an unknown player', async () => {
      const res = await request(app).put('/api/players/update').send({ id: 'ghost' }).expect(404);

      expect(res.body.error.code).toBe('PLAYER_NOT_FOUND');
      expect(res.body.error.message).toBe('Player not found: ghost');
    });

    it('unsubscribes a seated player and backfills from the queue', async () => {
      await seat('p1');
      await seat('p2');
      await seat('p3');

      await request(app).post('/api/players/unsubscribe').send({ id: 'p1' }).expect(200);

      const state = engine.snapshot();
      expect(state.playerA?.id).toBe('p3');
      expect(state.queue).toEqual([]);
    });

    it('answers 400 when the id is missing', async () => {
      const res = await request(app).post('/api/players/unsubscribe').send({}).expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(res.body.error.message).toBe('id: Required');
    });
  });

  describe('POST /api/players/move', () => {
    beforeEach(async () => {
      await seat('p1');
      await seat('p2');
    });

    it('places a mark and returns the new state', async () => {
      const res = await request(app)
        .post('/api/players/move')
        .send({ playerId: 'p1', x: 0, y: 0 })
        .expect(200);

      expect(res.body.data.game.board[0][0]).toBe(Piece.MarkA);
      expect(res.body.data.game.whoseTurn).toBe('B');
    });

    it('answers 400 MOVE_INVALID out of turn', async () => {
      const res = await request(app)
        .post('/api/players/move')
        .send({ playerId: 'p2', x: 0, y: 0 })
        .expect(400);

      expect(res.body.error).toMatchObject({ code: 'MOVE_INVALID', message: 'Not your turn' });
      expect(engine.snapshot().board?.[0][0]).toBe(Piece.Empty);
    });

    it('answers 400 for an occupied cell', async () => {
      await request(app).post('/api/players/move').send({ playerId: 'p1', x: 1, y: 1 }).expect(200);

      const res = await request(app)
        .post('/api/players/move')
        .send({ playerId: 'p2', x: 1, y: 1 })
        .expect(400);

      expect(res.body.error.message).toBe('Cell already occupied');
    });

    it('validates coordinates before reaching the engine', async () => {
      const res = await request(app)
        .post('/api/players/move')
        .send({ playerId: 'p1', x: 5, y: 0 })
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(res.body.error.message).toBe('x: Number must be less than or equal to 2');
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(app)
        .post('/api/players/move')
        .set('Content-Type', 'application/json')
        .send('{"playerId": ')
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_JSON');
    });

    it('rejects bodies over the size limit', async () => {
      const res = await request(app)
        .post('/api/players/move')
        .send({ playerId: 'p'.repeat(20_000), x: 0, y: 0 })
        .expect(413);

      expect(res.body.error.code).toBe('PAYLOAD_TOO_LARGE');
      expect(res.body.error.message).toBe('Request body too large');
    });
  });

  describe('game', () => {
    it('returns the full snapshot', async () => {
      await seat('p1');

      const res = await request(app).get('/api/game').expect(200);

      expect(res.body.success).toBe(true);
      expect(res.body.data.game).toMatchObject({
        playerA: { id: 'p1', name: null },
        playerB: null,
        queue: [],
        whoseTurn: 'A',
        status: 'InsufficientPlayers',
        moveTimeoutMs: 60_000,
      });
    });

    it('resets the table', async () => {
      await seat('p1');
      await seat('p2');

      const res = await request(app).post('/api/game/reset').expect(200);

      expect(res.body.data.game.playerA).toBeNull();
      expect(res.body.data.game.status).toBe('InsufficientPlayers');
    });
  });

  describe('POST /api/persistence/init', () => {
    it('attaches the sink and mirrors the current state', async () => {
      await seat('p1');

      const res = await request(app)
        .post('/api/persistence/init')
        .send({ url: 'redis://localhost:6379', key: 'table:test' })
        .expect(200);

      expect(res.body.data).toEqual({ sink: 'recording', key: 'table:test' });
      expect(connectStateSink).toHaveBeenCalledWith({ url: 'redis://localhost:6379', key: 'table:test' });
      expect(engine.hasStateSink()).toBe(true);

      await engine.flushNotifications();
      expect(sink.snapshots).toHaveLength(1);
      expect(sink.snapshots[0].playerA?.id).toBe('p1');
    });

    it('closes the previous sink once the replacement holds the current state', async () => {
      const previous = new RecordingSink();
      let replacementWritesAtClose = -1;
      const close = jest.fn(async () => {
        replacementWritesAtClose = sink.snapshots.length;
      });
      connectStateSink.mockResolvedValueOnce(Object.assign(previous, { close }));
      await request(app).post('/api/persistence/init').send({ url: 'redis://one:6379' }).expect(200);
      await seat('p1');

      await request(app).post('/api/persistence/init').send({ url: 'redis://two:6379' }).expect(200);

      expect(close).toHaveBeenCalledTimes(1);
      expect(replacementWritesAtClose).toBeGreaterThanOrEqual(1);
      expect(sink.snapshots[sink.snapshots.length - 1].playerA?.id).toBe('p1');
    });

    it('requires a URL when none is configured', async () => {
      const res = await request(app).post('/api/persistence/init').send({}).expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(connectStateSink).not.toHaveBeenCalled();
    });

    it('rejects a malformed URL', async () => {
      const res = await request(app)
        .post('/api/persistence/init')
        .send({ url: 'not a url' })
        .expect(400);

      expect(res.body.error.message).toBe('url: Invalid url');
    });

    it('answers 503 when the store cannot be reached', async () => {
      connectStateSink.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      const res = await request(app)
        .post('/api/persistence/init')
        .send({ url: 'redis://localhost:6379' })
        .expect(503);

      expect(res.body.error.code).toBe('PERSISTENCE_UNAVAILABLE');
      expect(engine.hasStateSink()).toBe(false);
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nowhere').expect(404);

    expect(res.body.error.code).toBe('NOT_FOUND');
    expect(res.body.error.message).toBe('Route /api/nowhere not found');
  });
});
