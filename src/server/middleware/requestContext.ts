import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { runWithContext } from '../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Tags each request with a correlation id (the caller's X-Request-Id when
 * non-blank, otherwise a fresh UUID), echoes it on the response and serves
 * the rest of the pipeline inside that log context.
 */
export const requestContext = (req: Request, res: Response, next: NextFunction): void => {
  const supplied = req.header(REQUEST_ID_HEADER)?.trim();
  const requestId = supplied ? supplied : randomUUID();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  runWithContext({ requestId, method: req.method, path: req.path, startTime: Date.now() }, () => next());
};
