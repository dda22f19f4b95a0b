/**
 * Logout HTTP Application
 *
 * Hono binding of the logout endpoint: every configured path accepts all
 * methods (method checks belong to the Extract stage) and the pipeline
 * outcome is turned into a redirect or an inline JSON response.
 */

import { Hono, type Context } from 'hono';
import {
  createLogger,
  ErrorFactory,
  getLogger,
  HTTP_STATUS,
  PipelineCancelledError,
  requestContextMiddleware,
  type RequestContextEnv,
} from '@endsession/lib-core';
import type { PipelineOutcome } from '@endsession/lib-pipeline';
import { LogoutEndpoint, type LogoutEndpointOptions } from './endpoint';

const log = createLogger().module('LOGOUT_APP');

// nginx's "client closed request"; never reaches the client
const CLIENT_CLOSED_REQUEST = 499;

function jsonResponse(body: unknown, status: number): Response {
  // Response constructor directly: c.json() only takes known status literals
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      'Content-Type': 'application/json',
      'Cache-Control': 'no-store',
      Pragma: 'no-cache',
    },
  });
}

export function toHttpResponse(c: Context<RequestContextEnv>, outcome: PipelineOutcome): Response {
  switch (outcome.kind) {
    case 'redirect': {
      // c.redirect() builds a fresh Response; headers go on a copy of it
      const response = c.redirect(outcome.location, HTTP_STATUS.FOUND);
      const headers = new Headers(response.headers);
      headers.set('Cache-Control', 'no-store');
      return new Response(response.body, { status: response.status, headers });
    }
    case 'inline':
      return jsonResponse(outcome.body, outcome.status);
  }
}

/**
 * Route handler running one request through the endpoint
 */
export function logoutHandler(endpoint: LogoutEndpoint) {
  return async (c: Context<RequestContextEnv>): Promise<Response> => {
    try {
      const outcome = await endpoint.process(c.req.raw, {
        requestId: c.get('requestId'),
        logger: getLogger(c),
        signal: c.req.raw.signal,
      });
      return toHttpResponse(c, outcome);
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        return new Response(null, { status: CLIENT_CLOSED_REQUEST });
      }
      throw error;
    }
  };
}

/**
 * Create the Hono application serving the logout endpoint
 *
 * @example
 * const app = createLogoutApp({ applications: store, endpointPaths: ['/connect/logout'] });
 * serve({ fetch: app.fetch, port: 8787 });
 */
export function createLogoutApp(options: LogoutEndpointOptions | LogoutEndpoint = {}) {
  const endpoint = options instanceof LogoutEndpoint ? options : new LogoutEndpoint(options);
  const app = new Hono<RequestContextEnv>();

  app.use('*', requestContextMiddleware());

  const handler = logoutHandler(endpoint);
  for (const path of endpoint.paths) {
    app.all(path, handler);
  }

  app.onError((error, c) => {
    getLogger(c).error('Unhandled error', { path: c.req.path }, error);
    return jsonResponse(ErrorFactory.serverError().toJSON(), HTTP_STATUS.INTERNAL_SERVER_ERROR);
  });

  app.notFound(() => jsonResponse({ error: 'not_found' }, HTTP_STATUS.NOT_FOUND));

  log.debug('Logout endpoint mounted', { paths: endpoint.paths });
  return app;
}
