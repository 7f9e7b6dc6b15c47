// ============================================================================
// Operation Registry
// ============================================================================
// Built once per connector. Opens every service descriptor in order, checks
// that each exposes exactly one operation, and binds it under its canonical
// name. All network I/O happens here, up front; a registry that exists is
// fully bound.
//
// Two conventions share the discovery step:
//   - createOperationRegistry:      callback style, node-soap callback methods
//   - createAsyncOperationRegistry: promise style, node-soap *Async methods
// ============================================================================

import { log } from '../config.js';
import { UnknownOperationError } from '../errors.js';
import { BindingPlan } from './discovery.js';
import type {
  AsyncOperation,
  Callback,
  CallbackOperation,
  OpenedDescriptor,
  OperationDescriptor,
} from './types.js';

export type {
  AsyncOperation,
  Callback,
  CallbackOperation,
  OpenedDescriptor,
  OperationDescriptor,
} from './types.js';
export { BindingPlan, bindOperations, canonicalName } from './discovery.js';
export * from './descriptors.js';

// ============================================================================
// Descriptor openers
// ============================================================================

export interface DescriptorOpener {
  open(locator: string, done: Callback<OpenedDescriptor<CallbackOperation>>): void;
}

export interface AsyncDescriptorOpener {
  open(locator: string): Promise<OpenedDescriptor<AsyncOperation>>;
}

// ============================================================================
// Registry
// ============================================================================

export class OperationRegistry<Op> {
  private readonly bindings: ReadonlyMap<string, OperationDescriptor<Op>>;

  constructor(bindings: ReadonlyMap<string, OperationDescriptor<Op>>) {
    this.bindings = bindings;
  }

  /** Bound operation by canonical name. */
  get(name: string): OperationDescriptor<Op> {
    const descriptor = this.bindings.get(name);
    if (!descriptor) {
      throw new UnknownOperationError(name, this.names());
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  get size(): number {
    return this.bindings.size;
  }
}

/**
 * Callback convention. Descriptors are opened strictly one after another; the
 * first failed open or rejected descriptor ends construction.
 */
export function createOperationRegistry(
  opener: DescriptorOpener,
  locators: readonly string[],
  done: Callback<OperationRegistry<CallbackOperation>>
): void {
  const plan = new BindingPlan<CallbackOperation>();

  const next = (index: number): void => {
    if (index === locators.length) {
      const registry = new OperationRegistry(plan.bind());
      log(`registry: bound ${registry.size} operations from ${locators.length} descriptors`);
      done(null, registry);
      return;
    }

    const locator = locators[index];
    opener.open(locator, (err, descriptor) => {
      if (err || !descriptor) {
        done(err ?? new Error(`Descriptor ${locator} did not open`));
        return;
      }
      try {
        plan.add(descriptor);
      } catch (planErr) {
        done(planErr instanceof Error ? planErr : new Error(String(planErr)));
        return;
      }
      next(index + 1);
    });
  };

  next(0);
}

/**
 * Promise convention. Same algorithm; each open is awaited in turn, nothing
 * runs concurrently.
 */
export async function createAsyncOperationRegistry(
  opener: AsyncDescriptorOpener,
  locators: readonly string[]
): Promise<OperationRegistry<AsyncOperation>> {
  const plan = new BindingPlan<AsyncOperation>();
  for (const locator of locators) {
    plan.add(await opener.open(locator));
  }

  const registry = new OperationRegistry(plan.bind());
  log(`registry: bound ${registry.size} operations from ${locators.length} descriptors`);
  return registry;
}
