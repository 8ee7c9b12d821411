import { NodeRegistrationError } from '../exception/failures.js';
import type { ExecutionNode, NodeDefinition, NodeOptions } from './execution-node.js';

/** A dependency named by id, or by the node class that owns the id. */
export type DependencyRef = string | { readonly nodeId: string };

export interface NodeClass<N extends ExecutionNode = ExecutionNode> {
  new (definition: NodeDefinition, options?: NodeOptions): N;
  readonly nodeId: string;
  readonly dependsOn?: readonly DependencyRef[];
}

interface RegisteredNode extends NodeDefinition {
  readonly nodeClass: NodeClass;
}

const NODE_ID_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Maps node ids to node classes. Built once at startup from a static table;
 * every registration problem throws there, never during a run.
 */
export class NodeRegistry {
  private nodes = new Map<string, RegisteredNode>();

  static fromTable(table: readonly NodeClass[]): NodeRegistry {
    const registry = new NodeRegistry();
    for (const nodeClass of table) {
      registry.register(nodeClass);
    }
    return registry;
  }

  /**
   * Register a node class. Dependencies given as classes are resolved to ids
   * here, so the dependency gate only ever sees strings.
   */
  register(nodeClass: NodeClass): NodeDefinition {
    const id = nodeClass.nodeId;
    if (typeof id !== 'string' || !NODE_ID_PATTERN.test(id)) {
      throw new NodeRegistrationError(`Node id "${String(id)}" must match ${NODE_ID_PATTERN}`);
    }
    if (this.nodes.has(id)) {
      throw new NodeRegistrationError(`Node "${id}" is already registered`);
    }

    const dependencies = (nodeClass.dependsOn ?? []).map(canonicalDependency);
    for (const dependency of dependencies) {
      if (!NODE_ID_PATTERN.test(dependency)) {
        throw new NodeRegistrationError(`Node "${id}" declares malformed dependency "${dependency}"`);
      }
      if (dependency === id) {
        throw new NodeRegistrationError(`Node "${id}" cannot depend on itself`);
      }
    }

    const entry: RegisteredNode = Object.freeze({
      id,
      dependencies: Object.freeze([...new Set(dependencies)]),
      nodeClass,
    });
    this.nodes.set(id, entry);
    return { id: entry.id, dependencies: entry.dependencies };
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get(id: string): NodeDefinition | undefined {
    const entry = this.nodes.get(id);
    return entry ? { id: entry.id, dependencies: entry.dependencies } : undefined;
  }

  list(): NodeDefinition[] {
    return Array.from(this.nodes.values(), (entry) => ({
      id: entry.id,
      dependencies: entry.dependencies,
    }));
  }

  create(id: string, options: NodeOptions = {}): ExecutionNode {
    const entry = this.nodes.get(id);
    if (!entry) {
      throw new NodeRegistrationError(`Node "${id}" is not registered`);
    }
    return new entry.nodeClass({ id: entry.id, dependencies: entry.dependencies }, options);
  }

  /** Instantiate nodes in the given run order. */
  createPipeline(ids: readonly string[], options: NodeOptions = {}): ExecutionNode[] {
    const seen = new Set<string>();
    return ids.map((id) => {
      if (seen.has(id)) {
        throw new NodeRegistrationError(`Node "${id}" appears twice in the pipeline`);
      }
      seen.add(id);
      return this.create(id, options);
    });
  }
}

function canonicalDependency(ref: DependencyRef): string {
  return typeof ref === 'string' ? ref : ref.nodeId;
}
