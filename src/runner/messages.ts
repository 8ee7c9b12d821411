import type {
  Metric,
  MetricsList,
  Severity,
  StateDetails,
  StreamMessage,
} from '../types/index.js';
import { MetricPayloadSchema } from '../schemas/message.schema.js';

export const ORCHESTRATOR_ID = 'orchestrator';

type MessageInit = Partial<Omit<StreamMessage, 'message'>> & { message: string };

export function createMessage(init: MessageInit): StreamMessage {
  return Object.freeze({
    source: 'agent',
    type: 'evaluation',
    severity: 'info',
    ...init,
    nodeId: init.nodeId ?? null,
    nodeName: init.nodeName ?? null,
    timestamp: init.timestamp ?? new Date().toISOString(),
  } satisfies StreamMessage);
}

/** Shorthand for the plain evaluation messages nodes emit most. */
export function note(message: string, severity: Severity = 'info'): StreamMessage {
  return createMessage({ message, severity });
}

export function stateMessage(message: string, details: StateDetails): StreamMessage {
  return createMessage({
    message,
    nodeId: details.nodeId ?? null,
    nodeName: details.nodeName ?? null,
    source: 'orchestrator',
    type: 'state',
    details,
  });
}

export function metricsMessage(message: string, details: Metric | MetricsList): StreamMessage {
  return createMessage({ message, type: 'metrics', details: MetricPayloadSchema.parse(details) });
}

/**
 * Fill in the origin of a message that has none. A message already carrying
 * an origin is returned untouched.
 */
export function attribute(message: StreamMessage, nodeId: string, nodeName: string): StreamMessage {
  if (typeof message.nodeId === 'string') {
    return message;
  }
  return Object.freeze({ ...message, nodeId, nodeName });
}
