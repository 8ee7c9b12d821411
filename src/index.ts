export type * from './types/index.js';
export * from './exception/failures.js';
export { classifyFailure, type NodeOutcome, type PreconditionKind } from './exception/classifier.js';
export { ReturningGenerator } from './runner/returning-generator.js';
export { ExecutionHistory } from './runner/history.js';
export { createContext, normalizeTarget, type RunContext, type RunResources } from './runner/context.js';
export { ExecutionNode, type NodeDefinition, type NodeOptions, type NodeResult } from './runner/execution-node.js';
export { NodeRegistry, type NodeClass, type DependencyRef } from './runner/node-registry.js';
export { Orchestrator, type OrchestratorOptions, type RunOptions, type RunSummary } from './runner/orchestrator.js';
export { ORCHESTRATOR_ID, attribute, createMessage, metricsMessage, note, stateMessage } from './runner/messages.js';
export { HttpSession, HttpSessionError, type SessionResponse } from './engines/http-session.js';
export type { BrowserEngine } from './engines/browser-engine.js';
export { PlaywrightEngine, launchBrowser } from './engines/playwright-engine.js';
export { AccessCheckNode, BrowserAccessNode, BUILTIN_NODES, DEFAULT_PIPELINE, createBuiltinRegistry } from './nodes/index.js';
export { createLogger } from './logging/logger.js';
export { RunLogger, encodeMessage } from './logging/run-logger.js';
export { writeSummary, buildSummaryMarkdown } from './logging/summary-writer.js';
export { loadConfig, ConfigError, type EvaluatorConfig } from './config/config.js';
