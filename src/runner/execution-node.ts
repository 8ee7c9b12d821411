import type { Logger } from 'pino';
import type { z } from 'zod';
import type { StreamMessage } from '../types/index.js';
import { AssertionFailure, DependencyFailure } from '../exception/failures.js';
import { defaultLogger } from '../logging/logger.js';
import type { RunContext } from './context.js';
import { ReturningGenerator } from './returning-generator.js';

export type NodeResult<T> = ReturningGenerator<StreamMessage, T>;

/** What a registry binds to a node class: its id and canonical dependency ids. */
export interface NodeDefinition {
  readonly id: string;
  readonly dependencies: readonly string[];
}

export interface NodeOptions {
  logger?: Logger;
}

/**
 * One named, dependency-gated step of an evaluation pipeline.
 *
 * Subclasses implement {@link run} as an async generator: every yielded
 * message is relayed to the consumer as it happens, and the generator's return
 * value becomes the node's result. Throw a {@link PreconditionFailure} to stop
 * the node with a recorded failure.
 */
export abstract class ExecutionNode<T = unknown> {
  readonly id: string;
  readonly dependencies: readonly string[];
  protected readonly logger: Logger;

  constructor(definition: NodeDefinition, options: NodeOptions = {}) {
    this.id = definition.id;
    this.dependencies = Object.freeze([...definition.dependencies]);
    this.logger = (options.logger ?? defaultLogger()).child({ nodeId: this.id });
  }

  get displayName(): string {
    return this.id.replace(/_/g, ' ').toUpperCase();
  }

  /**
   * Check dependencies, then start the node. The dependency check throws
   * synchronously, before any of the node's own work runs.
   */
  evaluate(context: RunContext): NodeResult<T> {
    this.ensureDependencies(context);
    return new ReturningGenerator(this.run(context));
  }

  /** Run the node to completion, dropping its messages. */
  async evaluateWithoutMessages(context: RunContext): Promise<T> {
    return this.evaluate(context).exhaust();
  }

  protected abstract run(context: RunContext): AsyncGenerator<StreamMessage, T, undefined>;

  /** Read and validate the success value a dependency recorded. */
  protected upstreamValue<S extends z.ZodTypeAny>(
    context: RunContext,
    nodeId: string,
    schema: S,
  ): z.output<S> {
    if (!context.history.has(nodeId)) {
      throw DependencyFailure.missing(this.id, nodeId);
    }
    const { outcome } = context.history.get(nodeId);
    if (!outcome.ok) {
      throw DependencyFailure.upstreamFailed(this.id, nodeId);
    }
    const parsed = schema.safeParse(outcome.value);
    if (!parsed.success) {
      throw new AssertionFailure(`Unexpected result from ${nodeId}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private ensureDependencies(context: RunContext): void {
    this.logger.debug(`Checking dependencies for ${this.id}`);
    for (const dependency of this.dependencies) {
      if (!context.history.has(dependency)) {
        throw DependencyFailure.missing(this.id, dependency);
      }
      if (!context.history.get(dependency).outcome.ok) {
        throw DependencyFailure.upstreamFailed(this.id, dependency);
      }
      this.logger.debug(`Dependency ${dependency} found for ${this.id}`);
    }
  }
}
