/**
 * @endsession/lib-pipeline
 *
 * Staged request-processing pipeline: transactions, stage contexts,
 * the handler registry and the executor that drives them.
 */

export * from './core';
