import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CircuitBreaker,
  createCircuitBreaker,
  isCircuitOpen,
  type CircuitBreakerOptions,
} from './circuit-breaker.js';
import { isOk, isErr } from './result.js';

class RetryableError extends Error {}

describe('CircuitBreaker', () => {
  const defaultOptions: CircuitBreakerOptions = {
    name: 'test-circuit',
    failureThreshold: 3,
    cooldownMs: 5000,
  };

  const failing = () => vi.fn(async (): Promise<string> => {
    throw new Error('fail');
  });

  const openCircuit = async (cb: CircuitBreaker): Promise<void> => {
    const fn = failing();
    for (let i = 0; i < defaultOptions.failureThreshold; i++) {
      await cb.execute(fn);
    }
  };

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('closed state', () => {
    it('executes function successfully when closed', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      const fn = vi.fn(async () => 'success');

      const result = await cb.execute(fn);

      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value).toBe('success');
      }
      expect(fn).toHaveBeenCalledTimes(1);
      expect(cb.getState()).toBe('closed');
    });

    it('stays closed below the threshold', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      const fn = failing();

      await cb.execute(fn);
      await cb.execute(fn);

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().consecutiveFailures).toBe(2);
    });

    it('opens after exactly the failure threshold', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      const fn = failing();

      await cb.execute(fn);
      await cb.execute(fn);
      expect(cb.getState()).toBe('closed');

      await cb.execute(fn);
      expect(cb.getState()).toBe('open');
    });

    it('resets the consecutive count on success', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      const fn = failing();

      await cb.execute(fn);
      await cb.execute(fn);
      await cb.execute(async () => 'ok');
      await cb.execute(fn);

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().consecutiveFailures).toBe(1);
    });

    it('does not count errors rejected by isFailure', async () => {
      const cb = new CircuitBreaker({
        ...defaultOptions,
        isFailure: (error) => error instanceof RetryableError,
      });
      const permanent = vi.fn(async (): Promise<string> => {
        throw new Error('bad request');
      });

      for (let i = 0; i < 5; i++) {
        const result = await cb.execute(permanent);
        expect(isErr(result)).toBe(true);
      }

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().consecutiveFailures).toBe(0);
    });
  });

  describe('open state', () => {
    it('rejects calls without executing them', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      await openCircuit(cb);

      const fn = vi.fn(async () => 'never');
      const result = await cb.execute(fn);

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(isCircuitOpen(result.error)).toBe(true);
        if (isCircuitOpen(result.error)) {
          expect(result.error.circuitName).toBe('test-circuit');
          expect(result.error.retryInMs).toBe(5000);
        }
      }
      expect(fn).not.toHaveBeenCalled();
    });

    it('keeps rejecting until the cooldown elapses', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      await openCircuit(cb);

      vi.advanceTimersByTime(4999);
      const fn = vi.fn(async () => 'ok');
      await cb.execute(fn);

      expect(fn).not.toHaveBeenCalled();
      expect(cb.getState()).toBe('open');
    });
  });

  describe('half-open state', () => {
    it('admits exactly one probe after the cooldown', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      await openCircuit(cb);
      vi.advanceTimersByTime(5000);

      let releaseProbe: (value: string) => void = () => undefined;
      const probe = vi.fn(
        () =>
          new Promise<string>((resolve) => {
            releaseProbe = resolve;
          })
      );
      const other = vi.fn(async () => 'other');

      const probeResult = cb.execute(probe);
      const otherResult = await cb.execute(other);

      expect(cb.getState()).toBe('half-open');
      expect(probe).toHaveBeenCalledTimes(1);
      expect(other).not.toHaveBeenCalled();
      expect(isErr(otherResult)).toBe(true);

      releaseProbe('done');
      expect(isOk(await probeResult)).toBe(true);
    });

    it('closes when the probe succeeds', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      await openCircuit(cb);
      vi.advanceTimersByTime(5000);

      await cb.execute(async () => 'ok');

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().consecutiveFailures).toBe(0);
    });

    it('reopens and restarts the cooldown when the probe fails', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      await openCircuit(cb);
      vi.advanceTimersByTime(5000);

      await cb.execute(failing());
      expect(cb.getState()).toBe('open');

      vi.advanceTimersByTime(4999);
      const fn = vi.fn(async () => 'ok');
      await cb.execute(fn);
      expect(fn).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      await cb.execute(fn);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(cb.getState()).toBe('closed');
    });
  });

  describe('state change callback', () => {
    it('reports every transition', async () => {
      const onStateChange = vi.fn();
      const cb = new CircuitBreaker({ ...defaultOptions, onStateChange });

      await openCircuit(cb);
      vi.advanceTimersByTime(5000);
      await cb.execute(async () => 'ok');

      expect(onStateChange.mock.calls).toEqual([
        ['test-circuit', 'closed', 'open'],
        ['test-circuit', 'open', 'half-open'],
        ['test-circuit', 'half-open', 'closed'],
      ]);
    });
  });

  describe('reset', () => {
    it('returns to the initial state', async () => {
      const cb = new CircuitBreaker(defaultOptions);
      await openCircuit(cb);

      cb.reset();

      expect(cb.getStats()).toEqual({
        state: 'closed',
        consecutiveFailures: 0,
        probeInFlight: false,
        openedAt: undefined,
      });
    });
  });
});

describe('createCircuitBreaker', () => {
  it('fills in defaults', async () => {
    const cb = createCircuitBreaker('my-service', { failureThreshold: 1 });

    await cb.execute(async () => {
      throw new Error('boom');
    });

    expect(cb.getState()).toBe('open');
  });
});
