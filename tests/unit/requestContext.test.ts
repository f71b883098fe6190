import express from 'express';
import request from 'supertest';
import { requestContext } from '../../src/server/middleware/requestContext';
import { getRequestContext } from '../../src/server/utils/logger';

const buildApp = () => {
  const app = express();
  app.use(requestContext);
  app.get('/whoami', (req, res) => {
    res.json({ requestId: req.requestId, context: getRequestContext() ?? null });
  });
  return app;
};

describe('requestContext middleware', () => {
  it('echoes a supplied X-Request-Id and exposes it to the log context', async () => {
    const res = await request(buildApp()).get('/whoami').set('X-Request-Id', 'req-123').expect(200);

    expect(res.headers['x-request-id']).toBe('req-123');
    expect(res.body.requestId).toBe('req-123');
    expect(res.body.context).toMatchObject({ requestId: 'req-123', method: 'GET', path: '/whoami' });
  });

  it('generates an id when the header is absent or blank', async () => {
    const res = await request(buildApp()).get('/whoami').set('X-Request-Id', '   ').expect(200);

    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.body.requestId).toBe(res.headers['x-request-id']);
  });

  it('leaves no context outside a request', () => {
    expect(getRequestContext()).toBeUndefined();
  });
});
