/**
 * Handler Registry
 *
 * Central registry for stage handlers. Extensions register their handlers
 * here during startup, and the executor resolves the ordered chain of a
 * stage for every request.
 */

import { z } from 'zod';
import { DuplicatePriorityConflictError, InvalidOperationError } from '@endsession/lib-core';
import {
  PIPELINE_STAGES,
  type AnyHandlerDescriptor,
  type HandlerDescriptor,
  type PipelineStage,
} from './types';

/**
 * Shape check for descriptors coming from configuration or plugins
 */
export const HandlerDescriptorSchema = z.object({
  name: z.string().trim().min(1, { message: 'Handler name must not be empty' }),
  stage: z.enum(PIPELINE_STAGES),
  priority: z.number().finite().optional(),
  handle: z.function(),
});

export interface RegisterOptions {
  /**
   * Refuse a handler whose priority equals the priority of another handler
   * of the same stage instead of ordering the two by registration
   */
  strictOrdering?: boolean;
}

interface RegisteredHandler<S extends PipelineStage> {
  descriptor: HandlerDescriptor<S>;
  priority: number;
  /** Registration slot, used to break priority ties */
  sequence: number;
}

type HandlerTable = { [S in PipelineStage]: Map<string, RegisteredHandler<S>> };

function createTable(): HandlerTable {
  return {
    extract: new Map(),
    validate: new Map(),
    handle: new Map(),
    applyResponse: new Map(),
  };
}

function byPriority<S extends PipelineStage>(
  a: RegisteredHandler<S>,
  b: RegisteredHandler<S>
): number {
  return a.priority - b.priority || a.sequence - b.sequence;
}

/**
 * Design:
 * - Names are unique across stages; registering an existing name replaces
 *   the handler and keeps its registration slot
 * - Resolution is a pure function of the registry contents
 * - Once sealed, the registry is read-only
 */
export class HandlerRegistry {
  private table = createTable();
  private stageByName = new Map<string, PipelineStage>();
  private sequence = 0;
  private sealed = false;

  constructor(descriptors: Iterable<AnyHandlerDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.registerAny(descriptor);
    }
  }

  /**
   * Register a descriptor whose stage is only known at run time
   */
  registerAny(descriptor: AnyHandlerDescriptor, options: RegisterOptions = {}): void {
    switch (descriptor.stage) {
      case 'extract':
        return this.register(descriptor, options);
      case 'validate':
        return this.register(descriptor, options);
      case 'handle':
        return this.register(descriptor, options);
      case 'applyResponse':
        return this.register(descriptor, options);
    }
  }

  /**
   * Register or replace a handler
   *
   * @throws DuplicatePriorityConflictError with `strictOrdering` when another
   * handler of the stage has the same priority
   */
  register<S extends PipelineStage>(
    descriptor: HandlerDescriptor<S>,
    options: RegisterOptions = {}
  ): void {
    this.assertWritable();

    const parsed = HandlerDescriptorSchema.safeParse(descriptor);
    if (!parsed.success) {
      throw new TypeError(
        `Invalid handler descriptor '${String(descriptor.name)}': ` +
          parsed.error.issues.map((issue) => issue.message).join('; ')
      );
    }

    const priority = descriptor.priority ?? 0;
    const handlers = this.table[descriptor.stage];
    const previous = handlers.get(descriptor.name);

    if (options.strictOrdering) {
      for (const [name, registered] of handlers) {
        if (name !== descriptor.name && registered.priority === priority) {
          throw new DuplicatePriorityConflictError(descriptor.stage, priority, name, descriptor.name);
        }
      }
    }

    // A name moving to another stage leaves its old stage
    const previousStage = this.stageByName.get(descriptor.name);
    if (previousStage !== undefined && previousStage !== descriptor.stage) {
      this.table[previousStage].delete(descriptor.name);
    }

    handlers.set(descriptor.name, {
      descriptor,
      priority,
      sequence: previous?.sequence ?? this.sequence++,
    });
    this.stageByName.set(descriptor.name, descriptor.stage);
  }

  /**
   * Remove a handler by name
   *
   * @returns true when a handler was removed
   */
  remove(name: string): boolean {
    this.assertWritable();

    const stage = this.stageByName.get(name);
    if (stage === undefined) {
      return false;
    }
    this.stageByName.delete(name);
    return this.table[stage].delete(name);
  }

  has(name: string): boolean {
    return this.stageByName.has(name);
  }

  get(name: string): AnyHandlerDescriptor | undefined {
    const stage = this.stageByName.get(name);
    return stage === undefined ? undefined : this.lookup(stage, name);
  }

  /**
   * Ordered handler chain of a stage
   */
  resolve<S extends PipelineStage>(stage: S): HandlerDescriptor<S>[] {
    const handlers: Map<string, RegisteredHandler<S>> = this.table[stage];
    return Array.from(handlers.values())
      .sort(byPriority)
      .map((registered) => registered.descriptor);
  }

  /**
   * Handler names, in invocation order, for one stage or for all stages
   */
  list(stage?: PipelineStage): string[] {
    const stages: readonly PipelineStage[] = stage ? [stage] : PIPELINE_STAGES;
    return stages.flatMap((s) => this.resolve(s).map((descriptor) => descriptor.name));
  }

  /**
   * Make the registry read-only. Called once request handling starts.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Clear all registrations
   *
   * Mainly for testing.
   */
  clear(): void {
    this.assertWritable();
    this.table = createTable();
    this.stageByName.clear();
    this.sequence = 0;
  }

  private lookup(stage: PipelineStage, name: string): AnyHandlerDescriptor | undefined {
    switch (stage) {
      case 'extract':
        return this.table.extract.get(name)?.descriptor;
      case 'validate':
        return this.table.validate.get(name)?.descriptor;
      case 'handle':
        return this.table.handle.get(name)?.descriptor;
      case 'applyResponse':
        return this.table.applyResponse.get(name)?.descriptor;
    }
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new InvalidOperationError(
        'Handlers cannot be registered or removed once the endpoint is serving requests.'
      );
    }
  }
}
