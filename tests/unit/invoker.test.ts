import { describe, it, expect, vi } from 'vitest';
import { UnknownOperationError } from '../../src/errors.js';
import {
  AsyncResilientInvoker,
  ResilientInvoker,
  type InvocationEvent,
  type Schedule,
} from '../../src/invoker/index.js';
import {
  OperationRegistry,
  type AsyncOperation,
  type CallbackOperation,
  type OperationDescriptor,
} from '../../src/registry/index.js';
import type { FieldMap } from '../../src/params/types.js';

function registryOf<Op>(name: string, operation: Op): OperationRegistry<Op> {
  const bindings = new Map<string, OperationDescriptor<Op>>([[name, { name, locator: `${name}.wsdl`, operation }]]);
  return new OperationRegistry(bindings);
}

const noSleep = async () => {};
const immediate: Schedule = fn => fn();

describe('Resilient invoker', () => {
  // ==========================================================================
  // Promise convention
  // ==========================================================================

  describe('AsyncResilientInvoker', () => {
    it('should return the operation result', async () => {
      const op = vi.fn<AsyncOperation>(async () => ({ Person: [] }));
      const invoker = new AsyncResilientInvoker(registryOf('GetPerson20111201', op), { sleep: noSleep });

      await expect(invoker.call('GetPerson20111201', { InstitutionIdentifier: 'AB' })).resolves.toEqual({ Person: [] });
      expect(op).toHaveBeenCalledWith({ InstitutionIdentifier: 'AB' });
    });

    it('should send a fresh copy of the fields on every attempt', async () => {
      const seen: FieldMap[] = [];
      const op: AsyncOperation = async fields => {
        seen.push(fields);
        fields.InstitutionIdentifier = 'mutated';
        if (seen.length < 3) throw new Error('busy');
        return 'ok';
      };
      const fields: FieldMap = { InstitutionIdentifier: 'AB' };
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep });

      await invoker.call('Op', fields);

      expect(seen).toHaveLength(3);
      expect(seen[0]).not.toBe(seen[1]);
      expect(fields).toEqual({ InstitutionIdentifier: 'AB' });
    });

    it('should give up after seven attempts with the final error', async () => {
      let attempts = 0;
      const op: AsyncOperation = async () => {
        attempts += 1;
        throw new Error(`fault ${attempts}`);
      };
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep });

      await expect(invoker.call('Op', {})).rejects.toThrow('fault 7');
      expect(attempts).toBe(7);
    });

    it('should honour a retry override', async () => {
      const op = vi.fn<AsyncOperation>(async () => {
        throw new Error('down');
      });
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep, retry: { attempts: 2 } });

      await expect(invoker.call('Op', {})).rejects.toThrow('down');
      expect(op).toHaveBeenCalledTimes(2);
      expect(invoker.policy.attempts).toBe(2);
    });

    it('should reject an unknown operation without calling anything', async () => {
      const op = vi.fn<AsyncOperation>(async () => null);
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep });

      await expect(invoker.call('Other', {})).rejects.toThrow(UnknownOperationError);
      expect(op).not.toHaveBeenCalled();
    });

    it('should emit attempt, retry and result events', async () => {
      let calls = 0;
      const op: AsyncOperation = async () => {
        calls += 1;
        if (calls === 1) throw new Error('busy');
        return 'ok';
      };
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep });
      const events: InvocationEvent[] = [];
      invoker.on('attempt', e => events.push(e));
      invoker.on('retry', e => events.push(e));
      invoker.on('result', e => events.push(e));

      await invoker.call('Op', {});

      expect(events.map(e => [e.type, e.attempt])).toEqual([
        ['attempt', 1],
        ['retry', 1],
        ['attempt', 2],
        ['result', 2],
      ]);
      expect(events[1].delay_ms).toBe(2000);
      expect(events[1].error).toBe('busy');
    });

    it('should emit a failure event once retries run out', async () => {
      const op: AsyncOperation = async () => {
        throw new Error('down');
      };
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep, retry: { attempts: 3 } });
      const failures: InvocationEvent[] = [];
      invoker.on('failure', e => failures.push(e));

      await expect(invoker.call('Op', {})).rejects.toThrow('down');

      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({ type: 'failure', operation: 'Op', attempt: 3, error: 'down' });
    });

    it('should pass retry notices to the logger', async () => {
      const logger = vi.fn();
      let calls = 0;
      const op: AsyncOperation = async () => {
        calls += 1;
        if (calls === 1) throw new Error('busy');
        return 'ok';
      };
      const invoker = new AsyncResilientInvoker(registryOf('Op', op), { sleep: noSleep, logger });

      await invoker.call('Op', {});

      expect(logger).toHaveBeenCalledWith('Op attempt 1 failed: busy');
    });
  });

  // ==========================================================================
  // Callback convention
  // ==========================================================================

  describe('ResilientInvoker', () => {
    it('should deliver the result through the callback', () => {
      const op: CallbackOperation = (fields, done) => done(null, { echoed: fields });
      const invoker = new ResilientInvoker(registryOf('Op', op), { schedule: immediate });
      const done = vi.fn();

      invoker.call('Op', { UUIDIndicator: true }, done);

      expect(done).toHaveBeenCalledWith(null, { echoed: { UUIDIndicator: true } });
    });

    it('should retry with the same delays as the promise convention', () => {
      const delays: number[] = [];
      const schedule: Schedule = (fn, ms) => {
        delays.push(ms);
        fn();
      };
      let attempts = 0;
      const op: CallbackOperation = (_fields, done) => {
        attempts += 1;
        done(new Error(`fault ${attempts}`));
      };
      const invoker = new ResilientInvoker(registryOf('Op', op), { schedule });
      const done = vi.fn();

      invoker.call('Op', {}, done);

      expect(attempts).toBe(7);
      expect(delays).toEqual([2000, 4000, 8000, 16000, 32000, 64000]);
      expect(done).toHaveBeenCalledTimes(1);
      expect(done.mock.calls[0][0]).toBeInstanceOf(Error);
      expect(done.mock.calls[0][0].message).toBe('fault 7');
    });

    it('should throw synchronously for an unknown operation', () => {
      const op: CallbackOperation = (_fields, done) => done(null, null);
      const invoker = new ResilientInvoker(registryOf('Op', op), { schedule: immediate });

      expect(() => invoker.call('Other', {}, () => {})).toThrow(UnknownOperationError);
    });

    it('should emit a failure event with the final attempt', () => {
      const op: CallbackOperation = (_fields, done) => done(new Error('down'));
      const invoker = new ResilientInvoker(registryOf('Op', op), { schedule: immediate, retry: { attempts: 2 } });
      const failures: InvocationEvent[] = [];
      invoker.on('failure', e => failures.push(e));

      invoker.call('Op', {}, () => {});

      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({ type: 'failure', operation: 'Op', attempt: 2, error: 'down' });
    });
  });
});
