import type { StreamMessage } from '../types/index.js';
import { PreconditionFailure } from '../exception/failures.js';
import { HttpSessionError, type SessionResponse } from '../engines/http-session.js';
import type { RunContext } from '../runner/context.js';
import { ExecutionNode } from '../runner/execution-node.js';
import { metricsMessage, note } from '../runner/messages.js';

export const PLAUSIBLE_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Confirms the target answers over HTTP with an HTML document. Sends OPTIONS
 * then GET and reports header problems along the way; the GET response is the
 * node's result.
 */
export class AccessCheckNode extends ExecutionNode<SessionResponse> {
  static readonly nodeId = 'access_check';

  override get displayName(): string {
    return 'Reachability Check';
  }

  protected async *run(context: RunContext): AsyncGenerator<StreamMessage, SessionResponse, undefined> {
    const issues: string[] = [];
    const report = (message: StreamMessage): StreamMessage => {
      issues.push(message.message);
      return message;
    };

    const shake = await this.send(() => context.session.options(context.target));
    if (!shake.ok) {
      yield report(note('Failed to pre-fetch the website via OPTIONS.', 'error'));
    }
    for (const message of inspectContentType(shake, 'OPTIONS')) {
      yield report(message);
    }

    const response = await this.send(() => context.session.get(context.target));
    if (!response.ok) {
      this.logger.info({ status: response.status }, 'GET returned a non-success status');
      throw new PreconditionFailure('Failed to connect to the website');
    }

    for (const message of inspectContentType(response, 'GET')) {
      yield report(message);
    }
    if (response.headers['content-type'] !== shake.headers['content-type']) {
      yield report(note('Content-Type header mismatch between pre-fetch and fetch', 'warning'));
    }

    yield note('Successfully connected to the website.');
    yield metricsMessage('Reachability assessment', {
      name: 'Reachability',
      score: Math.max(0, 100 - issues.length * 25),
      issues,
    });
    return response;
  }

  private async send(request: () => Promise<SessionResponse>): Promise<SessionResponse> {
    try {
      return await request();
    } catch (error) {
      if (error instanceof HttpSessionError) {
        this.logger.info({ err: error }, 'Request to target failed');
        throw new PreconditionFailure('Failed to connect to the website', { cause: error });
      }
      throw error;
    }
  }
}

export function inspectContentType(response: SessionResponse, method: 'GET' | 'OPTIONS'): StreamMessage[] {
  const contentType = response.headers['content-type'];
  if (contentType === undefined) {
    return [note(`Content-Type header missing in ${method} response.`, 'bug')];
  }
  if (!PLAUSIBLE_CONTENT_TYPES.some((type) => contentType.startsWith(type))) {
    return [note(`Invalid Content-Type header in ${method} response.`, 'error')];
  }
  return [];
}
