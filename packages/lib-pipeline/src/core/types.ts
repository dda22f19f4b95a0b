/**
 * Pipeline Types
 */

import type {
  ApplyResponseContext,
  ExtractRequestContext,
  HandleRequestContext,
  ValidateRequestContext,
} from './context';
import type { JsonObject, ParameterValue } from './message';

// =============================================================================
// Stages & Dispositions
// =============================================================================

/**
 * Processing stages, in execution order
 */
export const PIPELINE_STAGES = ['extract', 'validate', 'handle', 'applyResponse'] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface RejectedDisposition {
  kind: 'rejected';
  error: string;
  description?: string;
  uri?: string;
}

/**
 * Outcome signalled by the handlers of one stage
 *
 * - continue: run the stage's default logic
 * - skipped: skip the default logic of this stage only
 * - handled: bypass all remaining default logic up to Apply-Response
 * - rejected: abort default logic and emit an error response
 */
export type Disposition =
  | { kind: 'continue' }
  | { kind: 'skipped' }
  | { kind: 'handled' }
  | RejectedDisposition;

// =============================================================================
// Handlers
// =============================================================================

export interface StageContextMap {
  extract: ExtractRequestContext;
  validate: ValidateRequestContext;
  handle: HandleRequestContext;
  applyResponse: ApplyResponseContext;
}

export type StageHandler<S extends PipelineStage> = (
  context: StageContextMap[S]
) => void | Promise<void>;

/**
 * Named unit of extension logic bound to one stage
 */
export interface HandlerDescriptor<S extends PipelineStage = PipelineStage> {
  /** Unique name; registering the same name again replaces the handler */
  name: string;
  stage: S;
  /** Lower runs earlier (default: 0); ties run in registration order */
  priority?: number;
  handle: StageHandler<S>;
}

export type AnyHandlerDescriptor = { [S in PipelineStage]: HandlerDescriptor<S> }[PipelineStage];

/**
 * Built-in logic of an endpoint, run per stage when no handler signalled
 */
export interface EndpointDefaults {
  extract?: StageHandler<'extract'>;
  validate?: StageHandler<'validate'>;
  handle?: StageHandler<'handle'>;
  applyResponse?: StageHandler<'applyResponse'>;
}

// =============================================================================
// Outcome
// =============================================================================

export interface RedirectOutcome {
  kind: 'redirect';
  status: number;
  location: string;
  parameters: Record<string, ParameterValue>;
}

export interface InlineOutcome {
  kind: 'inline';
  status: number;
  body: JsonObject;
}

/**
 * What the transport must send back for one request
 */
export type PipelineOutcome = RedirectOutcome | InlineOutcome;
