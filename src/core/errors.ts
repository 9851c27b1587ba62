import type { EntityRef } from '../types';

export type GraphErrorCode =
  | 'duplicate-id'
  | 'missing-node'
  | 'missing-edge'
  | 'dangling-edge'
  | 'stale-state'
  | 'invalid-size'
  | 'invalid-position'
  | 'invalid-edge'
  | 'empty-clipboard';

/** Invariant violation; the offending change set was rejected as a whole. */
export type GraphError = {
  readonly _tag: 'GraphError';
  readonly code: GraphErrorCode;
  readonly message: string;
  readonly entityId?: string;
};

/** Storage failure. The refs stay pending and are retried. */
export type IOError = {
  readonly _tag: 'IOError';
  readonly message: string;
  readonly cause: unknown;
  readonly refs: readonly EntityRef[];
};

/** A routing decision could not be made from the hit test; routed to the canvas. */
export type RoutingAmbiguity = {
  readonly _tag: 'RoutingAmbiguity';
  readonly message: string;
  readonly cause?: unknown;
};

export function graphError(code: GraphErrorCode, message: string, entityId?: string): GraphError {
  return entityId === undefined
    ? { _tag: 'GraphError', code, message }
    : { _tag: 'GraphError', code, message, entityId };
}

export function ioError(message: string, cause: unknown, refs: readonly EntityRef[]): IOError {
  return { _tag: 'IOError', message, cause, refs };
}

export function routingAmbiguity(message: string, cause?: unknown): RoutingAmbiguity {
  return cause === undefined
    ? { _tag: 'RoutingAmbiguity', message }
    : { _tag: 'RoutingAmbiguity', message, cause };
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'unknown error';
}
