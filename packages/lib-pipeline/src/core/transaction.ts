/**
 * Transaction
 *
 * Per-request container carried through every stage. Owned by the executor
 * for the duration of one request and never shared across requests.
 */

import { randomUUID } from 'node:crypto';
import { createLogger, InvalidOperationError, type Logger } from '@endsession/lib-core';
import { isJsonObject, OAuthMessage, type JsonObject } from './message';
import type { Disposition, RejectedDisposition } from './types';

/**
 * Values the property bag can hold
 */
export type PropertyValue = string | string[] | JsonObject;

/**
 * Property names with a meaning to the pipeline itself
 */
export const TRANSACTION_PROPERTIES = {
  /** Structured object emitted verbatim as the inline response body */
  CUSTOM_RESPONSE: 'custom_response',
  /** Redirect URI accepted during validation */
  VALIDATED_REDIRECT_URI: '.validated_redirect_uri',
  /** Identifier of the application the redirect URI was matched against */
  APPLICATION_ID: '.application_id',
} as const;

export const CONTINUE: Disposition = { kind: 'continue' };

export interface TransactionOptions {
  /** Endpoint name, used for log correlation */
  endpoint?: string;
  requestId?: string;
  logger?: Logger;
  /** Aborts the pipeline at its next suspension point */
  signal?: AbortSignal;
}

export class Transaction {
  readonly requestId: string;
  readonly endpoint: string;
  readonly raw: Request;
  readonly response = new OAuthMessage();
  readonly logger: Logger;
  readonly signal?: AbortSignal;

  private bound?: OAuthMessage;
  private readonly properties = new Map<string, PropertyValue>();
  private current: Disposition = CONTINUE;

  constructor(raw: Request, options: TransactionOptions = {}) {
    this.raw = raw;
    this.requestId = options.requestId ?? randomUUID();
    this.endpoint = options.endpoint ?? 'unknown';
    this.signal = options.signal;
    this.logger = (options.logger ?? createLogger().module('PIPELINE')).child({
      requestId: this.requestId,
      endpoint: this.endpoint,
    });
  }

  /**
   * The OAuth request bound during Extract.
   *
   * @throws InvalidOperationError when read before a request was bound
   */
  get request(): OAuthMessage {
    if (!this.bound) {
      throw new InvalidOperationError(
        'The request parameters are not available: the extract stage has not bound them yet.'
      );
    }
    return this.bound;
  }

  get hasRequest(): boolean {
    return this.bound !== undefined;
  }

  tryGetRequest(): OAuthMessage | undefined {
    return this.bound;
  }

  bindRequest(message: OAuthMessage): void {
    this.bound = message;
  }

  /**
   * Terminal disposition of the pipeline. Only `handled` and `rejected`
   * are ever recorded here; stage-local skips stay on the stage context.
   */
  get disposition(): Disposition {
    return this.current;
  }

  get isRejected(): boolean {
    return this.current.kind === 'rejected';
  }

  get isHandled(): boolean {
    return this.current.kind === 'handled';
  }

  markHandled(): void {
    if (this.current.kind === 'continue') {
      this.current = { kind: 'handled' };
    }
  }

  markRejected(rejection: RejectedDisposition): void {
    this.current = rejection;
  }

  // ==========================================================================
  // Property bag
  // ==========================================================================

  getProperty(key: string): PropertyValue | undefined {
    return this.properties.get(key);
  }

  getStringProperty(key: string): string | undefined {
    const value = this.properties.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  getObjectProperty(key: string): JsonObject | undefined {
    const value = this.properties.get(key);
    return isJsonObject(value) ? value : undefined;
  }

  setProperty(key: string, value: PropertyValue | undefined): this {
    if (value === undefined) {
      this.properties.delete(key);
    } else {
      this.properties.set(key, value);
    }
    return this;
  }

  hasProperty(key: string): boolean {
    return this.properties.has(key);
  }

  removeProperty(key: string): boolean {
    return this.properties.delete(key);
  }
}
