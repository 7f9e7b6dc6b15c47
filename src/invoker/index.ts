// ============================================================================
// Resilient Invoker
// ============================================================================
// Looks up a bound operation and calls it under the retry policy. Both calling
// conventions retry the same way. Every attempt is a real network call; the
// invoker does not know whether the remote operation is idempotent.
// ============================================================================

import { EventEmitter } from 'events';
import { log } from '../config.js';
import type { FieldMap } from '../params/types.js';
import type { OperationRegistry } from '../registry/index.js';
import type { AsyncOperation, Callback, CallbackOperation } from '../registry/types.js';
import {
  defaultSchedule,
  defaultSleep,
  resolveRetryPolicy,
  retryAsync,
  retryCallback,
  type RetryHooks,
  type RetryPolicy,
  type Schedule,
  type Sleep,
} from './retry.js';

export * from './retry.js';

// ============================================================================
// Invocation Events
// ============================================================================

export interface InvocationEvent {
  type: 'attempt' | 'retry' | 'result' | 'failure';
  operation: string;
  attempt: number;
  timestamp: string;
  delay_ms?: number;
  duration_ms?: number;
  error?: string;
}

export interface InvokerOptions {
  retry?: Partial<RetryPolicy>;
  /** Logger (defaults to no-op) */
  logger?: (msg: string) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Shared bookkeeping: policy, events and the hooks that feed them.
 */
abstract class InvokerBase<Op> {
  readonly events = new EventEmitter();
  readonly policy: RetryPolicy;
  protected readonly registry: OperationRegistry<Op>;
  protected readonly logger: (msg: string) => void;

  constructor(registry: OperationRegistry<Op>, options: InvokerOptions = {}) {
    this.registry = registry;
    this.policy = resolveRetryPolicy(options.retry);
    this.logger = options.logger ?? (() => {});
  }

  on(event: InvocationEvent['type'], listener: (evt: InvocationEvent) => void): this {
    this.events.on(event, listener);
    return this;
  }

  protected emit(evt: Omit<InvocationEvent, 'timestamp'>): void {
    this.events.emit(evt.type, { ...evt, timestamp: new Date().toISOString() });
  }

  protected hooks(operation: string): RetryHooks & { lastAttempt: () => number } {
    let current = 0;
    return {
      lastAttempt: () => current,
      onAttempt: attempt => {
        current = attempt;
        this.emit({ type: 'attempt', operation, attempt });
      },
      onRetry: ({ attempt, delayMs, error }) => {
        const message = errorMessage(error);
        log(`invoker: ${operation} attempt ${attempt}/${this.policy.attempts} failed (${message}), retrying in ${delayMs}ms`);
        this.logger(`${operation} attempt ${attempt} failed: ${message}`);
        this.emit({ type: 'retry', operation, attempt, delay_ms: delayMs, error: message });
      },
    };
  }
}

// ============================================================================
// Callback convention
// ============================================================================

export interface ResilientInvokerOptions extends InvokerOptions {
  schedule?: Schedule;
}

export class ResilientInvoker extends InvokerBase<CallbackOperation> {
  private readonly schedule: Schedule;

  constructor(registry: OperationRegistry<CallbackOperation>, options: ResilientInvokerOptions = {}) {
    super(registry, options);
    this.schedule = options.schedule ?? defaultSchedule;
  }

  /**
   * Call `operation` with `fields`. An unknown operation name throws
   * synchronously; everything else arrives through `done`.
   */
  call(operation: string, fields: FieldMap, done: Callback<unknown>): void {
    const { operation: invoke } = this.registry.get(operation);
    const hooks = this.hooks(operation);
    const startTime = Date.now();

    retryCallback<unknown>(
      (_attempt, attemptDone) => invoke({ ...fields }, attemptDone),
      this.policy,
      (err, result) => {
        const duration = Date.now() - startTime;
        if (err) {
          this.emit({ type: 'failure', operation, attempt: hooks.lastAttempt(), duration_ms: duration, error: err.message });
          done(err);
          return;
        }
        this.emit({ type: 'result', operation, attempt: hooks.lastAttempt(), duration_ms: duration });
        done(null, result);
      },
      hooks,
      this.schedule
    );
  }
}

// ============================================================================
// Promise convention
// ============================================================================

export interface AsyncResilientInvokerOptions extends InvokerOptions {
  sleep?: Sleep;
}

export class AsyncResilientInvoker extends InvokerBase<AsyncOperation> {
  private readonly sleep: Sleep;

  constructor(registry: OperationRegistry<AsyncOperation>, options: AsyncResilientInvokerOptions = {}) {
    super(registry, options);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Call `operation` with `fields`. Rejects with the final attempt's error,
   * unchanged, once the policy is exhausted.
   */
  async call(operation: string, fields: FieldMap): Promise<unknown> {
    const { operation: invoke } = this.registry.get(operation);
    const hooks = this.hooks(operation);
    const startTime = Date.now();

    try {
      const result = await retryAsync(() => invoke({ ...fields }), this.policy, hooks, this.sleep);
      this.emit({ type: 'result', operation, attempt: hooks.lastAttempt(), duration_ms: Date.now() - startTime });
      return result;
    } catch (err) {
      this.emit({
        type: 'failure',
        operation,
        attempt: hooks.lastAttempt(),
        duration_ms: Date.now() - startTime,
        error: errorMessage(err),
      });
      throw err;
    }
  }
}
