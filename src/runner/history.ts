import type { Artifact } from '../types/index.js';
import { ArtifactNotFoundError, DuplicateArtifactError } from '../exception/failures.js';

/**
 * Append-only record of node outcomes for one run, in execution order and
 * indexed by node id.
 */
export class ExecutionHistory {
  private readonly artifacts: Artifact[] = [];
  private readonly byNode = new Map<string, Artifact>();

  add(artifact: Artifact): void {
    if (this.byNode.has(artifact.nodeId)) {
      throw new DuplicateArtifactError(artifact.nodeId);
    }
    Object.freeze(artifact.messages);
    Object.freeze(artifact);
    this.artifacts.push(artifact);
    this.byNode.set(artifact.nodeId, artifact);
  }

  has(nodeId: string): boolean {
    return this.byNode.has(nodeId);
  }

  /** Callers check {@link has} first; a miss here is a bug in the caller. */
  get(nodeId: string): Artifact {
    const artifact = this.byNode.get(nodeId);
    if (!artifact) {
      throw new ArtifactNotFoundError(nodeId);
    }
    return artifact;
  }

  list(): readonly Artifact[] {
    return [...this.artifacts];
  }

  get size(): number {
    return this.artifacts.length;
  }
}
