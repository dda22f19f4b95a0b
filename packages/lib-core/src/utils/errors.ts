/**
 * OIDC Error Handling Utilities
 *
 * Error types shared by the pipeline and the endpoints built on it.
 * Protocol errors are represented by OIDCError and always end up as
 * structured responses; the remaining classes signal programming or
 * configuration faults.
 */

import { ERROR_CODES, HTTP_STATUS } from '../constants';

/**
 * OAuth 2.0 / OIDC error response body
 */
export interface OAuthErrorBody {
  error: string;
  error_description?: string;
  error_uri?: string;
}

/**
 * Map an OAuth error code to the HTTP status of an inline error response.
 */
export function statusForError(error: string): number {
  switch (error) {
    case ERROR_CODES.SERVER_ERROR:
      return HTTP_STATUS.INTERNAL_SERVER_ERROR;
    case ERROR_CODES.TEMPORARILY_UNAVAILABLE:
      return HTTP_STATUS.SERVICE_UNAVAILABLE;
    default:
      return HTTP_STATUS.BAD_REQUEST;
  }
}

/**
 * OIDC Error class
 * Represents an OAuth 2.0 or OpenID Connect error with standardized properties
 */
export class OIDCError extends Error {
  public readonly error: string;
  public readonly error_description?: string;
  public readonly error_uri?: string;
  public readonly statusCode: number;

  constructor(
    error: string,
    error_description?: string,
    statusCode: number = statusForError(error),
    error_uri?: string
  ) {
    super(error_description || error);
    this.name = 'OIDCError';
    this.error = error;
    if (error_description !== undefined) {
      this.error_description = error_description;
    }
    if (error_uri !== undefined) {
      this.error_uri = error_uri;
    }
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OIDCError);
    }
  }

  /**
   * Convert error to JSON response object
   */
  toJSON(): OAuthErrorBody {
    const response: OAuthErrorBody = {
      error: this.error,
    };

    if (this.error_description) {
      response.error_description = this.error_description;
    }

    if (this.error_uri) {
      response.error_uri = this.error_uri;
    }

    return response;
  }
}

/**
 * Pre-defined error factory functions for the errors the logout flow emits
 */
export const ErrorFactory = {
  /**
   * Invalid request error
   * The request is missing a required parameter or is otherwise malformed.
   */
  invalidRequest: (description?: string): OIDCError =>
    new OIDCError(
      ERROR_CODES.INVALID_REQUEST,
      description || 'The request is missing a required parameter or is otherwise malformed',
      HTTP_STATUS.BAD_REQUEST
    ),

  /**
   * Server error
   * The authorization server encountered an unexpected error.
   */
  serverError: (description?: string): OIDCError =>
    new OIDCError(
      ERROR_CODES.SERVER_ERROR,
      description || 'An internal error occurred while processing the request.',
      HTTP_STATUS.INTERNAL_SERVER_ERROR
    ),
};

/**
 * An operation was attempted in a state that does not allow it,
 * e.g. reading a stage field before the stage producing it ran.
 */
export class InvalidOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

/**
 * Two handlers of the same stage were registered with the same priority
 * while strict ordering was requested.
 */
export class DuplicatePriorityConflictError extends Error {
  public readonly stage: string;
  public readonly priority: number;
  public readonly existing: string;
  public readonly incoming: string;

  constructor(stage: string, priority: number, existing: string, incoming: string) {
    super(
      `Handler '${incoming}' conflicts with handler '${existing}': ` +
        `both are registered on stage '${stage}' with priority ${priority}`
    );
    this.name = 'DuplicatePriorityConflictError';
    this.stage = stage;
    this.priority = priority;
    this.existing = existing;
    this.incoming = incoming;
  }
}

/**
 * A registered handler threw while processing a request.
 */
export class HandlerFaultError extends Error {
  public readonly handler: string;
  public readonly stage: string;

  constructor(handler: string, stage: string, cause: unknown) {
    super(
      `Handler '${handler}' failed during stage '${stage}': ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause }
    );
    this.name = 'HandlerFaultError';
    this.handler = handler;
    this.stage = stage;
  }
}

/**
 * The request was cancelled before the pipeline produced a response.
 */
export class PipelineCancelledError extends Error {
  constructor(stage: string) {
    super(`Request processing was cancelled during stage '${stage}'`);
    this.name = 'PipelineCancelledError';
  }
}

/**
 * Invalid endpoint or server configuration.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
