// ============================================================================
// Registry Types
// ============================================================================

import type { FieldMap } from '../params/types.js';

/** Node-style completion callback. `result` is set whenever `err` is null. */
export type Callback<T> = (err: Error | null, result?: T) => void;

/** Bound operation, callback convention. */
export type CallbackOperation = (fields: FieldMap, done: Callback<unknown>) => void;

/** Bound operation, promise convention. */
export type AsyncOperation = (fields: FieldMap) => Promise<unknown>;

/**
 * A connected service descriptor as the transport reports it: where it came
 * from, and each advertised operation name with its callable.
 */
export interface OpenedDescriptor<Op> {
  locator: string;
  operations: ReadonlyMap<string, Op>;
}

/** One bound operation. Immutable once the registry is built. */
export interface OperationDescriptor<Op> {
  readonly name: string;
  readonly locator: string;
  readonly operation: Op;
}
