// ============================================================================
// Errors
// ============================================================================
// Only RegistryConstructionError and exhausted-retry call errors are meant to
// reach callers in normal operation. UnknownOperationError marks a programmer
// error in the facade wiring.
// ============================================================================

/**
 * Registry construction failed. Raised before any operation is bound and
 * never retried.
 */
export class RegistryConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryConstructionError';
  }
}

/** A service descriptor advertised more or fewer than one operation. */
export class DescriptorShapeError extends RegistryConstructionError {
  readonly locator: string;
  readonly operations: string[];

  constructor(locator: string, operations: string[]) {
    super(
      `Descriptor ${locator} must expose exactly one operation, found ${operations.length}` +
        (operations.length > 0 ? ` (${operations.join(', ')})` : '')
    );
    this.name = 'DescriptorShapeError';
    this.locator = locator;
    this.operations = operations;
  }
}

/** Two descriptors resolved to the same canonical operation name. */
export class DuplicateOperationError extends RegistryConstructionError {
  readonly operation: string;
  readonly locators: [string, string];

  constructor(operation: string, first: string, second: string) {
    super(`Operation "${operation}" is bound by both ${first} and ${second}`);
    this.name = 'DuplicateOperationError';
    this.operation = operation;
    this.locators = [first, second];
  }
}

export class UnknownOperationError extends Error {
  readonly operation: string;

  constructor(operation: string, known: string[]) {
    super(`Operation "${operation}" is not bound. Bound: [${known.join(', ')}]`);
    this.name = 'UnknownOperationError';
    this.operation = operation;
  }
}

/** Releasing the shared HTTP session failed; its sockets may have leaked. */
export class ReleaseError extends Error {
  constructor(message: string, cause: unknown) {
    super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'ReleaseError';
  }
}

/** A query was made on a connector after close(). */
export class ConnectorClosedError extends Error {
  readonly query: string;

  constructor(query: string) {
    super(`Cannot run ${query}: connector is closed`);
    this.name = 'ConnectorClosedError';
    this.query = query;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
