/**
 * Stage Contexts
 *
 * One context per stage, each wrapping the transaction. Handlers steer the
 * pipeline through the three control operations; only one of them may be
 * used per context.
 */

import { ERROR_CODES, InvalidOperationError, type Logger } from '@endsession/lib-core';
import type { OAuthMessage } from './message';
import { CONTINUE, TRANSACTION_PROPERTIES, type Transaction } from './transaction';
import type { Disposition, PipelineStage } from './types';

export abstract class BaseStageContext {
  abstract readonly stage: PipelineStage;
  readonly transaction: Transaction;

  private current: Disposition = CONTINUE;

  constructor(transaction: Transaction) {
    this.transaction = transaction;
  }

  get disposition(): Disposition {
    return this.current;
  }

  get logger(): Logger {
    return this.transaction.logger;
  }

  get isRejected(): boolean {
    return this.current.kind === 'rejected';
  }

  get isRequestHandled(): boolean {
    return this.current.kind === 'handled';
  }

  get isRequestSkipped(): boolean {
    return this.current.kind === 'skipped';
  }

  get error(): string | undefined {
    return this.current.kind === 'rejected' ? this.current.error : undefined;
  }

  get errorDescription(): string | undefined {
    return this.current.kind === 'rejected' ? this.current.description : undefined;
  }

  get errorUri(): string | undefined {
    return this.current.kind === 'rejected' ? this.current.uri : undefined;
  }

  /**
   * Reject the request. An empty error code becomes `invalid_request`;
   * description and uri are kept as given.
   */
  reject(error?: string, description?: string, uri?: string): void {
    this.signal({
      kind: 'rejected',
      error: error || ERROR_CODES.INVALID_REQUEST,
      ...(description !== undefined && { description }),
      ...(uri !== undefined && { uri }),
    });
  }

  /**
   * Bypass the default logic of this and every later stage; the response is
   * emitted as populated so far.
   */
  handleRequest(): void {
    this.signal({ kind: 'handled' });
  }

  /**
   * Skip the default logic of this stage only.
   */
  skipRequest(): void {
    this.signal({ kind: 'skipped' });
  }

  private signal(next: Disposition): void {
    if (this.current.kind === 'continue') {
      this.current = next;
      return;
    }
    if (this.current.kind === next.kind) {
      return;
    }
    throw new InvalidOperationError(
      `The request cannot be marked as ${next.kind} during the ${this.stage} stage: ` +
        `it was already marked as ${this.current.kind}.`
    );
  }
}

export class ExtractRequestContext extends BaseStageContext {
  readonly stage = 'extract';

  get rawRequest(): Request {
    return this.transaction.raw;
  }

  /**
   * @throws InvalidOperationError until a request has been bound
   */
  get request(): OAuthMessage {
    return this.transaction.request;
  }

  set request(message: OAuthMessage) {
    this.transaction.bindRequest(message);
  }

  get hasRequest(): boolean {
    return this.transaction.hasRequest;
  }
}

export class ValidateRequestContext extends BaseStageContext {
  readonly stage = 'validate';

  get request(): OAuthMessage {
    return this.transaction.request;
  }

  /**
   * Redirect URI accepted by validation, if any
   */
  get redirectUri(): string | undefined {
    return this.transaction.getStringProperty(TRANSACTION_PROPERTIES.VALIDATED_REDIRECT_URI);
  }

  set redirectUri(value: string | undefined) {
    this.transaction.setProperty(TRANSACTION_PROPERTIES.VALIDATED_REDIRECT_URI, value);
  }

  /**
   * Application matched against the redirect URI, if any
   */
  get applicationId(): string | undefined {
    return this.transaction.getStringProperty(TRANSACTION_PROPERTIES.APPLICATION_ID);
  }

  set applicationId(value: string | undefined) {
    this.transaction.setProperty(TRANSACTION_PROPERTIES.APPLICATION_ID, value);
  }
}

export class HandleRequestContext extends BaseStageContext {
  readonly stage = 'handle';

  get request(): OAuthMessage {
    return this.transaction.request;
  }

  get response(): OAuthMessage {
    return this.transaction.response;
  }

  get redirectUri(): string | undefined {
    return this.transaction.getStringProperty(TRANSACTION_PROPERTIES.VALIDATED_REDIRECT_URI);
  }

  get applicationId(): string | undefined {
    return this.transaction.getStringProperty(TRANSACTION_PROPERTIES.APPLICATION_ID);
  }
}

export class ApplyResponseContext extends BaseStageContext {
  readonly stage = 'applyResponse';

  /** Redirect target; when unset the response is rendered inline */
  redirectUri?: string;

  /**
   * The bound request; absent when the request was rejected or handled
   * before Extract bound one.
   */
  get request(): OAuthMessage | undefined {
    return this.transaction.tryGetRequest();
  }

  get response(): OAuthMessage {
    return this.transaction.response;
  }

  get validatedRedirectUri(): string | undefined {
    return this.transaction.getStringProperty(TRANSACTION_PROPERTIES.VALIDATED_REDIRECT_URI);
  }
}
