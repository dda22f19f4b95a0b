/**
 * Stage transition table
 *
 * Pure mapping from (stage, disposition) to whether the stage's default logic
 * runs and which stage comes next.
 */

import type { Disposition, PipelineStage } from './types';

export type NextStage = PipelineStage | 'done';

export interface StageTransition {
  runDefaults: boolean;
  next: NextStage;
}

export function nextStage(stage: PipelineStage): NextStage {
  switch (stage) {
    case 'extract':
      return 'validate';
    case 'validate':
      return 'handle';
    case 'handle':
      return 'applyResponse';
    case 'applyResponse':
      return 'done';
  }
}

export function resolveTransition(stage: PipelineStage, disposition: Disposition): StageTransition {
  switch (disposition.kind) {
    case 'rejected':
    case 'handled':
      return {
        runDefaults: false,
        next: stage === 'applyResponse' ? 'done' : 'applyResponse',
      };
    case 'skipped':
      return { runDefaults: false, next: nextStage(stage) };
    case 'continue':
      return { runDefaults: true, next: nextStage(stage) };
  }
}
