import { DescriptorShapeError, DuplicateOperationError } from '../errors.js';
import { OPERATION_SUFFIX } from './descriptors.js';
import type { OpenedDescriptor, OperationDescriptor } from './types.js';

/**
 * Canonical name for an advertised operation name: the name with a single
 * trailing `Operation` removed.
 */
export function canonicalName(advertised: string): string {
  return advertised.endsWith(OPERATION_SUFFIX) && advertised.length > OPERATION_SUFFIX.length
    ? advertised.slice(0, -OPERATION_SUFFIX.length)
    : advertised;
}

/**
 * Accumulates descriptors as they are opened, rejecting a bad one the moment it
 * arrives. Nothing is bound until `bind()`, so a failure anywhere leaves no
 * partial table behind.
 */
export class BindingPlan<Op> {
  private readonly planned: Array<OperationDescriptor<Op>> = [];
  private readonly seen = new Map<string, string>();

  add(descriptor: OpenedDescriptor<Op>): void {
    const advertised = [...descriptor.operations.keys()];
    if (advertised.length !== 1) {
      throw new DescriptorShapeError(descriptor.locator, advertised);
    }

    const [advertisedName] = advertised;
    const name = canonicalName(advertisedName);
    const previous = this.seen.get(name);
    if (previous !== undefined) {
      throw new DuplicateOperationError(name, previous, descriptor.locator);
    }

    const operation = descriptor.operations.get(advertisedName);
    if (operation === undefined) {
      throw new DescriptorShapeError(descriptor.locator, []);
    }

    this.seen.set(name, descriptor.locator);
    this.planned.push(Object.freeze({ name, locator: descriptor.locator, operation }));
  }

  get size(): number {
    return this.planned.length;
  }

  bind(): ReadonlyMap<string, OperationDescriptor<Op>> {
    return new Map(this.planned.map((d): [string, OperationDescriptor<Op>] => [d.name, d]));
  }
}

/** Validate and bind a complete list of opened descriptors. */
export function bindOperations<Op>(
  descriptors: ReadonlyArray<OpenedDescriptor<Op>>
): ReadonlyMap<string, OperationDescriptor<Op>> {
  const plan = new BindingPlan<Op>();
  for (const descriptor of descriptors) {
    plan.add(descriptor);
  }
  return plan.bind();
}
