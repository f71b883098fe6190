/**
 * Security Headers Middleware Configuration
 *
 * The table serves JSON only, so helmet's defaults are enough; CORS is open
 * to the configured origin (any origin by default) because browser clients
 * poll the table directly.
 */

import helmet from 'helmet';
import cors from 'cors';
import { RequestHandler } from 'express';
import { config } from '../config';

export const securityHeaders: RequestHandler = helmet();

export const corsMiddleware: RequestHandler = cors({
  origin: config.server.corsOrigin === '*' ? true : config.server.corsOrigin.split(',').map((o) => o.trim()),
  methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID', 'Accept'],
  exposedHeaders: ['X-Request-ID'],
  maxAge: 600,
  optionsSuccessStatus: 204,
});

export const securityMiddleware = {
  headers: securityHeaders,
  cors: corsMiddleware,
};
