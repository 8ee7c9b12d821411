export type MessageSource = 'agent' | 'orchestrator';

export type MessageType =
  | 'evaluation'
  | 'state'
  | 'feedback'
  | 'test_scenarios'
  | 'metrics'
  | 'test_execution_report';

export type Severity =
  | 'info'
  | 'improvement'
  | 'warning'
  | 'error'
  | 'bug'
  | 'vulnerability'
  | 'malicious'
  | 'success';

export interface StreamMessage {
  readonly nodeId: string | null;
  readonly nodeName: string | null;
  readonly scenarioId?: string;
  readonly scenarioName?: string;
  readonly message: string;
  readonly source: MessageSource;
  readonly type: MessageType;
  readonly severity: Severity;
  readonly details?: unknown;
  readonly timestamp: string;
}

export interface StateDetails {
  nodeId?: string;
  nodeName?: string;
  scenarioId?: string;
  scenarioName?: string;
  isEndState: boolean;
}

export interface Metric {
  name: string;
  score?: number;
  feedback?: string;
  issues?: string[];
  improvements?: string[];
}

export interface MetricsList {
  name?: string;
  metrics: Metric[];
  feedback?: string;
  score?: number;
}
