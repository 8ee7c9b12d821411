import type { Logger } from 'pino';
import type { Artifact, StreamMessage } from '../types/index.js';
import { classifyFailure, success, type NodeOutcome } from '../exception/classifier.js';
import { defaultLogger } from '../logging/logger.js';
import { createContext, type RunContext, type RunResources } from './context.js';
import type { ExecutionNode } from './execution-node.js';
import { ORCHESTRATOR_ID, attribute, createMessage, stateMessage } from './messages.js';
import { ReturningGenerator } from './returning-generator.js';

export interface OrchestratorOptions {
  logger?: Logger;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}

export interface RunSummary {
  runId: string;
  target: string;
  startedAt: string;
  durationMs: number;
  artifacts: readonly Artifact[];
  /** Nodes whose artifact records a precondition failure. */
  failedNodes: string[];
  /** Nodes that left no artifact: stopped by a dependency, uncategorized failure or cancellation. */
  skippedNodes: string[];
  cancelled: boolean;
}

type Attempt = NodeOutcome | { kind: 'cancelled' };

/**
 * Runs a fixed list of nodes, one at a time, against a single context.
 *
 * Messages are relayed the moment a node yields them. Whatever a node does,
 * the run moves on to the next node and always ends with a state message.
 */
export class Orchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly nodes: readonly ExecutionNode[],
    options: OrchestratorOptions = {},
  ) {
    this.logger = (options.logger ?? defaultLogger()).child({ component: ORCHESTRATOR_ID });
  }

  run(
    target: string,
    resources: RunResources,
    options: RunOptions = {},
  ): ReturningGenerator<StreamMessage, RunSummary> {
    const context = createContext(target, resources, options);
    return new ReturningGenerator(this.execute(context));
  }

  private async *execute(context: RunContext): AsyncGenerator<StreamMessage, RunSummary, undefined> {
    const start = Date.now();
    const log = this.logger.child({ runId: context.runId });
    let cancelled = false;

    log.info({ target: context.target, nodes: this.nodes.map((n) => n.id) }, 'Evaluation started');

    for (const node of this.nodes) {
      if (context.signal?.aborted) {
        cancelled = true;
        break;
      }

      yield stateMessage(`Starting evaluation of ${node.id}...`, {
        nodeId: node.id,
        nodeName: node.displayName,
        isEndState: false,
      });

      const messages: StreamMessage[] = [];
      const outcome = yield* this.attempt(node, context, messages);
      if (outcome.kind === 'cancelled') {
        log.warn({ nodeId: node.id }, 'Evaluation cancelled while node was running');
        cancelled = true;
        break;
      }

      switch (outcome.kind) {
        case 'success':
          context.history.add({ nodeId: node.id, messages, outcome: { ok: true, value: outcome.value } });
          break;

        case 'precondition':
          log.info({ nodeId: node.id, subtype: outcome.subtype }, outcome.failure.message);
          yield createMessage({
            nodeId: node.id,
            nodeName: node.displayName,
            source: 'orchestrator',
            severity: 'error',
            message: outcome.failure.message,
          });
          // A node stopped by its dependencies never did its own work and
          // leaves no artifact; its dependents then see it as missing.
          if (outcome.subtype !== 'dependency') {
            context.history.add({ nodeId: node.id, messages, outcome: { ok: false, failure: outcome.failure } });
          }
          break;

        case 'uncategorized':
          log.error({ err: outcome.error, nodeId: node.id }, `${node.id} failed with an unexpected error`);
          yield createMessage({
            nodeId: ORCHESTRATOR_ID,
            nodeName: 'Orchestrator',
            source: 'orchestrator',
            severity: 'error',
            message: `${node.id} failed to run due to an unexpected error. Please contact support.`,
          });
          break;
      }
    }

    const summary = this.summarize(context, start, cancelled);
    log.info(
      { durationMs: summary.durationMs, failed: summary.failedNodes, skipped: summary.skippedNodes },
      cancelled ? 'Evaluation cancelled' : 'Evaluation complete',
    );

    yield stateMessage(cancelled ? 'Evaluation cancelled.' : 'Evaluation complete.', { isEndState: true });
    return summary;
  }

  /**
   * Evaluate one node, relaying and buffering its messages. Every thrown value,
   * including the synchronous dependency check, ends up as a tagged outcome.
   */
  private async *attempt(
    node: ExecutionNode,
    context: RunContext,
    messages: StreamMessage[],
  ): AsyncGenerator<StreamMessage, Attempt, undefined> {
    try {
      const result = node.evaluate(context);
      for await (const message of result) {
        const relayed = attribute(message, node.id, node.displayName);
        messages.push(relayed);
        yield relayed;
        // Leaving the loop closes the node's generator.
        if (context.signal?.aborted) {
          return { kind: 'cancelled' };
        }
      }
      return success(result.value);
    } catch (error) {
      return classifyFailure(error);
    }
  }

  private summarize(context: RunContext, start: number, cancelled: boolean): RunSummary {
    const artifacts = context.history.list();
    return {
      runId: context.runId,
      target: context.target,
      startedAt: context.startedAt,
      durationMs: Date.now() - start,
      artifacts,
      failedNodes: artifacts.filter((a) => !a.outcome.ok).map((a) => a.nodeId),
      skippedNodes: this.nodes.filter((n) => !context.history.has(n.id)).map((n) => n.id),
      cancelled,
    };
  }
}
