import { NodeRegistry, type NodeClass } from '../runner/node-registry.js';
import { AccessCheckNode } from './access-check.node.js';
import { BrowserAccessNode } from './browser-access.node.js';

export { AccessCheckNode } from './access-check.node.js';
export { BrowserAccessNode } from './browser-access.node.js';

export const BUILTIN_NODES: readonly NodeClass[] = [AccessCheckNode, BrowserAccessNode];

/** Default run order of the built-in pipeline. */
export const DEFAULT_PIPELINE: readonly string[] = [AccessCheckNode.nodeId, BrowserAccessNode.nodeId];

export function createBuiltinRegistry(): NodeRegistry {
  return NodeRegistry.fromTable(BUILTIN_NODES);
}
