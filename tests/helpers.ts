import { vi } from 'vitest';
import type { StreamMessage } from '../src/types/index.js';
import type { BrowserEngine } from '../src/engines/browser-engine.js';
import { HttpSession } from '../src/engines/http-session.js';
import { createLogger } from '../src/logging/logger.js';
import { createContext, type RunContext, type RunResources } from '../src/runner/context.js';
import { ExecutionNode, type NodeDefinition } from '../src/runner/execution-node.js';
import { note } from '../src/runner/messages.js';

export const silentLogger = createLogger({ level: 'silent' });

export function mockBrowser(overrides: Partial<BrowserEngine> = {}): BrowserEngine {
  return {
    goto: vi.fn().mockResolvedValue(undefined),
    currentUrl: vi.fn().mockResolvedValue('https://example.com/'),
    currentTitle: vi.fn().mockResolvedValue('Example'),
    ...overrides,
  };
}

export function makeResources(overrides: Partial<RunResources> = {}): RunResources {
  return {
    session: new HttpSession(),
    browser: mockBrowser(),
    ...overrides,
  };
}

export function makeContext(target = 'example.com', resources: RunResources = makeResources()): RunContext {
  return createContext(target, resources, { runId: 'test-run-001' });
}

export type Step = StreamMessage | Error;

/**
 * Test node that yields a fixed list of messages, throwing any Error in the
 * list when it reaches it, and otherwise returns `result`.
 */
export class ScriptedNode<T = string> extends ExecutionNode<T> {
  readonly runs = vi.fn();

  constructor(
    definition: NodeDefinition,
    private readonly steps: Step[],
    private readonly result: T,
  ) {
    super(definition, { logger: silentLogger });
  }

  protected async *run(): AsyncGenerator<StreamMessage, T, undefined> {
    this.runs();
    for (const step of this.steps) {
      if (step instanceof Error) throw step;
      yield step;
    }
    return this.result;
  }
}

export function scripted<T = string>(
  id: string,
  dependencies: string[],
  steps: Step[] = [note(`${id} working`)],
  result?: T,
): ScriptedNode<T | string> {
  return new ScriptedNode<T | string>({ id, dependencies }, steps, result ?? `${id} result`);
}
