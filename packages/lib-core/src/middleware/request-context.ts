/**
 * Request Context Middleware
 *
 * Establishes request-scoped context:
 * - Request ID for correlation across logs
 * - Structured logger instance carrying that ID
 *
 * Should be added early in the middleware chain so all subsequent
 * handlers have access to the context.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { createLogger, type Logger } from '../utils/logger';

/**
 * Request context available to all handlers via c.get()
 */
export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  requestId: string;
  /** Request start timestamp for duration calculation */
  startTime: number;
  /** Structured logger with request context */
  logger: Logger;
}

export type RequestContextEnv = { Variables: RequestContext };

/**
 * @example
 * app.use('*', requestContextMiddleware());
 *
 * // In handler
 * const logger = c.get('logger');
 * logger.info('Processing request', { stage: 'extract' });
 */
export function requestContextMiddleware() {
  return createMiddleware<RequestContextEnv>(async (c, next) => {
    const requestId = randomUUID();
    const startTime = Date.now();
    const logger = createLogger({ requestId });

    c.set('requestId', requestId);
    c.set('startTime', startTime);
    c.set('logger', logger);

    logger.debug('Request started', {
      method: c.req.method,
      path: c.req.path,
      userAgent: c.req.header('User-Agent'),
    });

    try {
      await next();
    } finally {
      logger.debug('Request completed', {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - startTime,
      });
    }
  });
}

/**
 * Get the logger from Hono context, falling back to a default logger when
 * the middleware was not applied.
 */
export function getLogger(c: Context<RequestContextEnv>): Logger {
  return c.get('logger') ?? createLogger();
}
