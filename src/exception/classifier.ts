import { AssertionFailure, DependencyFailure, PreconditionFailure } from './failures.js';

export type PreconditionKind = 'precondition' | 'assertion' | 'dependency';

export type NodeOutcome<T = unknown> =
  | { kind: 'success'; value: T }
  | { kind: 'precondition'; failure: PreconditionFailure; subtype: PreconditionKind }
  | { kind: 'uncategorized'; error: unknown };

export function success<T>(value: T): NodeOutcome<T> {
  return { kind: 'success', value };
}

/**
 * Turn a thrown value into a tagged outcome so the orchestrator can dispatch
 * on data instead of on catch clauses.
 */
export function classifyFailure(error: unknown): NodeOutcome<never> {
  if (error instanceof PreconditionFailure) {
    return { kind: 'precondition', failure: error, subtype: preconditionKind(error) };
  }
  return { kind: 'uncategorized', error };
}

function preconditionKind(failure: PreconditionFailure): PreconditionKind {
  if (failure instanceof DependencyFailure) return 'dependency';
  if (failure instanceof AssertionFailure) return 'assertion';
  return 'precondition';
}
