/**
 * Logout Endpoint
 *
 * Binds the generic pipeline to the logout defaults and owns the handler
 * registry extensions register into.
 */

import {
  ConfigurationError,
  createLogger,
  DEFAULT_LOGOUT_ENDPOINT_PATH,
  type Logger,
} from '@endsession/lib-core';
import {
  HandlerRegistry,
  PipelineExecutor,
  Transaction,
  type AnyHandlerDescriptor,
  type HandlerDescriptor,
  type PipelineOutcome,
  type PipelineStage,
  type RegisterOptions,
} from '@endsession/lib-pipeline';
import type { ApplicationResolver } from './applications';
import { createLogoutDefaults } from './logout';

export interface LogoutEndpointOptions {
  /** Accepted paths (default: ['/logout']) */
  endpointPaths?: string[];
  /** Disable the endpoint:logout permission check (default: false) */
  ignoreEndpointPermissions?: boolean;
  /** Accept well-formed redirect URIs without an application lookup (default: false) */
  degradedMode?: boolean;
  /** Registered application store; required unless degradedMode is set */
  applications?: ApplicationResolver;
  /** Handlers registered at construction */
  handlers?: AnyHandlerDescriptor[];
  logger?: Logger;
}

export interface ProcessOptions {
  requestId?: string;
  logger?: Logger;
  signal?: AbortSignal;
}

export const LOGOUT_ENDPOINT_NAME = 'logout';

export class LogoutEndpoint {
  readonly paths: readonly string[];
  readonly registry: HandlerRegistry;
  readonly ignoreEndpointPermissions: boolean;
  readonly degradedMode: boolean;

  private readonly executor: PipelineExecutor;
  private readonly logger: Logger;

  constructor(options: LogoutEndpointOptions = {}) {
    const paths = options.endpointPaths ?? [DEFAULT_LOGOUT_ENDPOINT_PATH];
    if (paths.length === 0) {
      throw new ConfigurationError('At least one logout endpoint path is required');
    }
    for (const path of paths) {
      if (!path.startsWith('/')) {
        throw new ConfigurationError(`Logout endpoint path '${path}' must start with '/'`);
      }
    }

    this.degradedMode = options.degradedMode ?? false;
    this.ignoreEndpointPermissions = options.ignoreEndpointPermissions ?? false;
    if (!this.degradedMode && !options.applications) {
      throw new ConfigurationError(
        'An application resolver is required unless degraded mode is enabled'
      );
    }

    this.paths = [...new Set(paths)];
    this.logger = (options.logger ?? createLogger()).module('LOGOUT');
    this.registry = new HandlerRegistry(options.handlers);
    this.executor = new PipelineExecutor({
      registry: this.registry,
      defaults: createLogoutDefaults({
        ignoreEndpointPermissions: this.ignoreEndpointPermissions,
        degradedMode: this.degradedMode,
        applications: options.applications,
      }),
    });
  }

  /**
   * Register or replace a handler. Only allowed before the first request.
   */
  register<S extends PipelineStage>(
    descriptor: HandlerDescriptor<S>,
    options?: RegisterOptions
  ): this {
    this.registry.register(descriptor, options);
    return this;
  }

  /**
   * Remove a handler by name. Only allowed before the first request.
   */
  remove(name: string): boolean {
    return this.registry.remove(name);
  }

  /**
   * Run one logout request through the pipeline
   *
   * @throws PipelineCancelledError when `signal` aborts before an outcome exists
   */
  async process(request: Request, options: ProcessOptions = {}): Promise<PipelineOutcome> {
    if (!this.registry.isSealed) {
      this.registry.seal();
      this.logger.debug('Handler registry sealed', { handlers: this.registry.list() });
    }

    const transaction = new Transaction(request, {
      endpoint: LOGOUT_ENDPOINT_NAME,
      requestId: options.requestId,
      logger: (options.logger ?? this.logger).module('LOGOUT'),
      signal: options.signal,
    });

    return this.executor.execute(transaction);
  }
}
