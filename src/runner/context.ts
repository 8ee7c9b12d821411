import { randomUUID } from 'node:crypto';
import type { BrowserEngine } from '../engines/browser-engine.js';
import type { HttpSession } from '../engines/http-session.js';
import { ExecutionHistory } from './history.js';

/** Handles owned by the caller and lent to every node for one run. */
export interface RunResources {
  session: HttpSession;
  browser: BrowserEngine;
}

export interface RunContext extends RunResources {
  readonly target: string;
  readonly history: ExecutionHistory;
  readonly runId: string;
  readonly startedAt: string;
  readonly signal?: AbortSignal;
}

export interface CreateContextOptions {
  runId?: string;
  signal?: AbortSignal;
}

export function normalizeTarget(target: string): string {
  const trimmed = target.trim();
  if (!trimmed.startsWith('http://') && !trimmed.startsWith('https://')) {
    return `https://${trimmed}`;
  }
  return trimmed;
}

export function createContext(
  target: string,
  resources: RunResources,
  options: CreateContextOptions = {},
): RunContext {
  return {
    target: normalizeTarget(target),
    session: resources.session,
    browser: resources.browser,
    history: new ExecutionHistory(),
    runId: options.runId ?? `run-${Date.now()}-${randomUUID().slice(0, 8)}`,
    startedAt: new Date().toISOString(),
    signal: options.signal,
  };
}
