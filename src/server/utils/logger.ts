import winston from 'winston';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

/**
 * Correlation data for the HTTP request currently being served. Engine code
 * never passes it around; the log formats pick it up from async storage.
 */
export interface RequestContext {
  requestId: string;
  method?: string;
  path?: string;
  startTime?: number;
}

const contextStore = new AsyncLocalStorage<RequestContext>();

/**
 * Context of the request being served, or undefined outside one (watchdog
 * firings and delayed round advancement run without a request).
 */
export const getRequestContext = (): RequestContext | undefined => contextStore.getStore();

export const runWithContext = <T>(context: RequestContext, fn: () => T): T =>
  contextStore.run(context, fn);

// ============================================================================
// Formats
// ============================================================================

const stampRequest = winston.format((info) => {
  const context = getRequestContext();
  if (!context) {
    return info;
  }
  info.requestId = context.requestId;
  if (context.method) info.method = context.method;
  if (context.path) info.path = context.path;
  return info;
});

// Engine and sink failures are logged as `{ error }`; keep them readable in JSON.
const flattenError = winston.format((info) => {
  const { error } = info;
  if (error instanceof Error) {
    info.error = { name: error.name, message: error.message, stack: error.stack };
  }
  return info;
});

const enrich = [winston.format.errors({ stack: true }), stampRequest(), flattenError()];

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  ...enrich,
  winston.format.json()
);

const prettyFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  ...enrich,
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, requestId, service, environment, ...meta }) => {
    const request = requestId ? ` [${String(requestId)}]` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${request}: ${String(message)}${extra}`;
  })
);

// ============================================================================
// Logger
// ============================================================================

const buildTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: config.logging.format === 'pretty' ? prettyFormat : jsonFormat,
      silent: config.isTest,
    }),
  ];

  if (config.logging.file) {
    transports.push(
      new winston.transports.File({
        filename: path.resolve(config.logging.file),
        format: jsonFormat,
        maxsize: 5 * 1024 * 1024,
        maxFiles: 5,
      })
    );
  }

  return transports;
};

export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: config.app.name,
    environment: config.nodeEnv,
  },
  transports: buildTransports(),
});
