import type { PreconditionFailure } from '../exception/failures.js';
import type { StreamMessage } from './message.js';

export type ArtifactOutcome<T = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: PreconditionFailure };

export interface Artifact<T = unknown> {
  readonly nodeId: string;
  readonly messages: readonly StreamMessage[];
  readonly outcome: ArtifactOutcome<T>;
}
