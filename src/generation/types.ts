import type { Origin, StageKind } from '../contracts/index.js';
import type { SchemaConstraint } from './constraints.js';
import type { ClassifiedError } from './gateway.js';
import type { FallbackInput } from '../fallback/index.js';

export interface GenerationRequest<T> {
  readonly stage: StageKind;
  readonly prompt: string;
  readonly constraint: SchemaConstraint<T>;
  readonly maxTokens: number;
  /** Inputs handed to the deterministic generator if every attempt fails. */
  readonly fallback: FallbackInput;
  /** Stage-specific repair applied to extracted model output before validation. */
  readonly normalize?: (candidate: unknown) => unknown;
}

export interface GenerationAttempt {
  readonly attempt: number;
  readonly rawResponse: string | null;
  readonly error: ClassifiedError | null;
  readonly violations: readonly string[];
}

export interface GenerationResult<T> {
  readonly stage: StageKind;
  readonly payload: T;
  readonly origin: Origin;
  readonly attempts: readonly GenerationAttempt[];
}
