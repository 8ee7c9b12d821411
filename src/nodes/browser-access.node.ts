import type { StreamMessage } from '../types/index.js';
import { SessionResponseSchema } from '../schemas/session.schema.js';
import type { RunContext } from '../runner/context.js';
import { ExecutionNode } from '../runner/execution-node.js';
import { note } from '../runner/messages.js';
import { AccessCheckNode } from './access-check.node.js';

export interface BrowserPage {
  url: string;
  title: string;
}

/** Loads the reachable target into the shared browser for later nodes. */
export class BrowserAccessNode extends ExecutionNode<BrowserPage> {
  static readonly nodeId = 'browser_access';
  static readonly dependsOn = [AccessCheckNode];

  override get displayName(): string {
    return 'Browser Access';
  }

  protected async *run(context: RunContext): AsyncGenerator<StreamMessage, BrowserPage, undefined> {
    const response = this.upstreamValue(context, AccessCheckNode.nodeId, SessionResponseSchema);
    // Land where the HTTP check ended up after redirects.
    await context.browser.goto(response.url);

    const page: BrowserPage = {
      url: await context.browser.currentUrl(),
      title: await context.browser.currentTitle(),
    };
    yield note('Successfully loaded the website into the browser.');
    return page;
  }
}
