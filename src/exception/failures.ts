/**
 * Expected stop conditions scoped to a single node.
 *
 * A node throws one of these when its input or environment makes further work
 * pointless. The orchestrator records it as the node's outcome and moves on to
 * the next node; dependents see it through the history.
 */
export class PreconditionFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PreconditionFailure';
  }
}

/** A node-local invariant does not hold, e.g. an unparsable payload. */
export class AssertionFailure extends PreconditionFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssertionFailure';
  }
}

export type DependencyFailureReason = 'missing' | 'upstream_failed';

/** A required upstream artifact is absent or holds a failure. */
export class DependencyFailure extends PreconditionFailure {
  constructor(
    message: string,
    public readonly dependency: string,
    public readonly reason: DependencyFailureReason,
  ) {
    super(message);
    this.name = 'DependencyFailure';
  }

  static missing(nodeId: string, dependency: string): DependencyFailure {
    return new DependencyFailure(
      `Dependency ${dependency} is required for ${nodeId}.`,
      dependency,
      'missing',
    );
  }

  static upstreamFailed(nodeId: string, dependency: string): DependencyFailure {
    return new DependencyFailure(
      `Skipping ${nodeId} since ${dependency} run failed.`,
      dependency,
      'upstream_failed',
    );
  }
}

export class ValueNotAvailableError extends Error {
  constructor() {
    super('Return value not available yet');
    this.name = 'ValueNotAvailableError';
  }
}

export class NodeRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NodeRegistrationError';
  }
}

export class DuplicateArtifactError extends Error {
  constructor(public readonly nodeId: string) {
    super(`An artifact for "${nodeId}" is already recorded in this run`);
    this.name = 'DuplicateArtifactError';
  }
}

export class ArtifactNotFoundError extends Error {
  constructor(public readonly nodeId: string) {
    super(`No artifact recorded for "${nodeId}"`);
    this.name = 'ArtifactNotFoundError';
  }
}
