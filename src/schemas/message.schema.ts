import { z } from 'zod';

export const MessageSourceSchema = z.enum(['agent', 'orchestrator']);

export const MessageTypeSchema = z.enum([
  'evaluation',
  'state',
  'feedback',
  'test_scenarios',
  'metrics',
  'test_execution_report',
]);

export const SeveritySchema = z.enum([
  'info',
  'improvement',
  'warning',
  'error',
  'bug',
  'vulnerability',
  'malicious',
  'success',
]);

export const MetricSchema = z.object({
  name: z.string(),
  score: z.number().int().min(0).max(100).optional(),
  feedback: z.string().optional(),
  issues: z.array(z.string()).optional(),
  improvements: z.array(z.string()).optional(),
});

export const MetricsListSchema = z.object({
  name: z.string().optional(),
  metrics: z.array(MetricSchema),
  feedback: z.string().optional(),
  score: z.number().int().min(0).max(100).optional(),
});

/** Payload of a `metrics` message. */
export const MetricPayloadSchema = z.union([MetricsListSchema, MetricSchema]);

export const StreamMessageSchema = z.object({
  nodeId: z.string().nullable(),
  nodeName: z.string().nullable(),
  scenarioId: z.string().optional(),
  scenarioName: z.string().optional(),
  message: z.string(),
  source: MessageSourceSchema,
  type: MessageTypeSchema,
  severity: SeveritySchema,
  details: z.unknown().optional(),
  timestamp: z.string().datetime(),
});

/** Envelope written once per message on the NDJSON stream. */
export const MessageUpdateSchema = z.object({
  type: z.literal('update'),
  content: StreamMessageSchema,
});
