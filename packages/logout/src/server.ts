/**
 * Node.js entry point
 *
 * Reads configuration from the environment and serves the logout endpoint.
 */

import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { logger as accessLogger } from 'hono/logger';
import { createLogger, loadEnvConfig, setLoggerConfig } from '@endsession/lib-core';
import { loadApplicationsFromFile } from './applications';
import { createLogoutApp } from './app';

const log = createLogger().module('SERVER');

async function main(): Promise<void> {
  const config = loadEnvConfig();
  setLoggerConfig({ level: config.logLevel, format: config.logFormat });

  const applications = config.applicationsFile
    ? await loadApplicationsFromFile(config.applicationsFile)
    : undefined;
  if (applications) {
    log.info('Applications loaded', { count: applications.size, file: config.applicationsFile });
  }

  const app = new Hono();
  app.use('*', accessLogger((message) => log.info(message)));
  app.route(
    '/',
    createLogoutApp({
      endpointPaths: config.endpointPaths,
      ignoreEndpointPermissions: config.ignoreEndpointPermissions,
      degradedMode: config.degradedMode,
      applications,
    })
  );

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info('Logout endpoint listening', {
      port: info.port,
      paths: config.endpointPaths,
      degradedMode: config.degradedMode,
    });
  });
}

main().catch((error: unknown) => {
  log.error('Server failed to start', {}, error instanceof Error ? error : undefined);
  process.exitCode = 1;
});
