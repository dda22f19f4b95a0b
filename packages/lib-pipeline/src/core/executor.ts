/**
 * Pipeline Executor
 *
 * Drives a transaction through Extract, Validate, Handle and Apply-Response.
 * Each stage runs its handler chain sequentially, then its default logic
 * when no handler signalled otherwise. Rejections and handled requests jump
 * straight to Apply-Response, which always runs before the outcome is built.
 */

import {
  ErrorFactory,
  HandlerFaultError,
  HTTP_STATUS,
  PipelineCancelledError,
  statusForError,
} from '@endsession/lib-core';
import {
  ApplyResponseContext,
  ExtractRequestContext,
  HandleRequestContext,
  ValidateRequestContext,
} from './context';
import { OAuthMessage } from './message';
import type { HandlerRegistry } from './registry';
import { TRANSACTION_PROPERTIES, type Transaction } from './transaction';
import { resolveTransition, type StageTransition } from './transition';
import type {
  EndpointDefaults,
  PipelineOutcome,
  PipelineStage,
  RejectedDisposition,
  StageContextMap,
  StageHandler,
} from './types';

export interface PipelineExecutorOptions {
  registry: HandlerRegistry;
  defaults?: EndpointDefaults;
}

const DEFAULT_HANDLER_PREFIX = 'default:';

function writeError(response: OAuthMessage, rejection: RejectedDisposition): void {
  response.error = rejection.error;
  response.errorDescription = rejection.description;
  response.errorUri = rejection.uri;
}

function serverErrorRejection(): RejectedDisposition {
  const error = ErrorFactory.serverError();
  return {
    kind: 'rejected',
    error: error.error,
    ...(error.error_description !== undefined && { description: error.error_description }),
  };
}

function assertRedirectTarget(target: string | undefined): void {
  if (target === undefined) {
    return;
  }
  try {
    new URL(target);
  } catch {
    throw new TypeError(`The redirect target '${target}' is not an absolute URL.`);
  }
}

export class PipelineExecutor {
  private readonly registry: HandlerRegistry;
  private readonly defaults: EndpointDefaults;

  constructor(options: PipelineExecutorOptions) {
    this.registry = options.registry;
    this.defaults = options.defaults ?? {};
  }

  /**
   * Run the whole pipeline for one transaction.
   *
   * @throws PipelineCancelledError when the transaction's signal aborts;
   * no outcome exists in that case
   */
  async execute(transaction: Transaction): Promise<PipelineOutcome> {
    const done = transaction.logger.startTimer('Pipeline');

    let transition = await this.process(
      'extract',
      new ExtractRequestContext(transaction),
      this.defaults.extract
    );

    if (transition.next === 'validate') {
      // A skipped Extract leaves an empty parameter set for later stages
      if (!transaction.hasRequest) {
        transaction.bindRequest(new OAuthMessage());
      }
      transition = await this.process(
        'validate',
        new ValidateRequestContext(transaction),
        this.defaults.validate
      );
    }

    if (transition.next === 'handle') {
      await this.process('handle', new HandleRequestContext(transaction), this.defaults.handle);
    }

    const outcome = await this.applyResponse(transaction);
    done();
    return outcome;
  }

  /**
   * Run one of the first three stages and report where to go next
   */
  private async process<S extends PipelineStage>(
    stage: S,
    context: StageContextMap[S],
    runDefault: StageHandler<S> | undefined
  ): Promise<StageTransition> {
    const { transaction } = context;
    this.throwIfCancelled(transaction, stage);

    for (const descriptor of this.registry.resolve(stage)) {
      if (!(await this.invoke(stage, descriptor.name, descriptor.handle, context))) {
        return resolveTransition(stage, transaction.disposition);
      }
      if (context.disposition.kind !== 'continue') {
        break;
      }
    }

    let transition = resolveTransition(stage, context.disposition);
    if (transition.runDefaults && runDefault) {
      if (!(await this.invoke(stage, DEFAULT_HANDLER_PREFIX + stage, runDefault, context))) {
        return resolveTransition(stage, transaction.disposition);
      }
      transition = resolveTransition(stage, context.disposition);
    }

    const disposition = context.disposition;
    switch (disposition.kind) {
      case 'rejected':
        transaction.markRejected(disposition);
        transaction.logger.info('Request rejected', {
          stage,
          error: disposition.error,
          ...(disposition.description !== undefined && { description: disposition.description }),
        });
        break;
      case 'handled':
        transaction.markHandled();
        transaction.logger.debug('Request handled by extension', { stage });
        break;
      case 'skipped':
        transaction.logger.debug('Default logic skipped', { stage });
        break;
      case 'continue':
        break;
    }

    return transition;
  }

  /**
   * Apply-Response: runs on every path and builds the outcome
   */
  private async applyResponse(transaction: Transaction): Promise<PipelineOutcome> {
    const stage = 'applyResponse';
    this.throwIfCancelled(transaction, stage);

    const context = new ApplyResponseContext(transaction);
    const arrival = transaction.disposition;
    if (arrival.kind === 'rejected') {
      writeError(transaction.response, arrival);
    }

    for (const descriptor of this.registry.resolve(stage)) {
      if (!(await this.invoke(stage, descriptor.name, descriptor.handle, context))) {
        return this.transmit(transaction, context);
      }
      if (context.disposition.kind !== 'continue') {
        break;
      }
    }

    const runDefaults =
      arrival.kind !== 'rejected' && resolveTransition(stage, context.disposition).runDefaults;
    if (runDefaults && this.defaults.applyResponse) {
      const completed = await this.invoke(
        stage,
        DEFAULT_HANDLER_PREFIX + stage,
        this.defaults.applyResponse,
        context
      );
      if (!completed) {
        return this.transmit(transaction, context);
      }
    }

    const disposition = context.disposition;
    if (disposition.kind === 'rejected') {
      transaction.markRejected(disposition);
      writeError(transaction.response, disposition);
      transaction.logger.info('Response rejected', { stage, error: disposition.error });
    } else if (disposition.kind === 'handled') {
      transaction.markHandled();
    }

    return this.transmit(transaction, context);
  }

  /**
   * Invoke one handler. A thrown error becomes a handler fault that rejects
   * the transaction with a server error; so does a redirect target an
   * Apply-Response handler left unparseable.
   *
   * @returns false when the handler faulted
   */
  private async invoke<S extends PipelineStage>(
    stage: S,
    name: string,
    handler: StageHandler<S>,
    context: StageContextMap[S]
  ): Promise<boolean> {
    const { transaction } = context;
    try {
      await handler(context);
      if (context instanceof ApplyResponseContext) {
        assertRedirectTarget(context.redirectUri);
      }
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        throw error;
      }
      this.throwIfCancelled(transaction, stage);

      const fault = new HandlerFaultError(name, stage, error);
      transaction.logger.error('Handler fault', { stage, handler: name }, fault);

      const rejection = serverErrorRejection();
      transaction.markRejected(rejection);
      if (stage === 'applyResponse') {
        writeError(transaction.response, rejection);
      }
      return false;
    }

    this.throwIfCancelled(transaction, stage);
    return true;
  }

  private transmit(transaction: Transaction, context: ApplyResponseContext): PipelineOutcome {
    const response = transaction.response;

    const error = response.error;
    if (error) {
      return { kind: 'inline', status: statusForError(error), body: response.toJSON() };
    }

    const custom = transaction.getObjectProperty(TRANSACTION_PROPERTIES.CUSTOM_RESPONSE);
    if (custom) {
      return { kind: 'inline', status: HTTP_STATUS.OK, body: custom };
    }

    if (context.redirectUri) {
      const location = response.appendTo(new URL(context.redirectUri));
      return {
        kind: 'redirect',
        status: HTTP_STATUS.FOUND,
        location: location.toString(),
        parameters: response.toJSON(),
      };
    }

    return { kind: 'inline', status: HTTP_STATUS.OK, body: response.toJSON() };
  }

  private throwIfCancelled(transaction: Transaction, stage: PipelineStage): void {
    if (transaction.signal?.aborted) {
      transaction.logger.debug('Request cancelled', { stage });
      throw new PipelineCancelledError(stage);
    }
  }
}
