import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  PollingManagerError,
  PollingTaskAlreadyExistsError,
  PollingTaskNotFoundError,
  PollingTaskValidationError,
} from '../src/errors.js';
import PollingManager from '../src/polling-manager.js';

describe('PollingManager', () => {
  let manager: PollingManager;

  beforeEach(() => {
    vi.useFakeTimers();
    manager = new PollingManager();
  });

  afterEach(() => {
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it('runs a task at once and then once per interval after it finished', async () => {
    const fn = vi.fn(async () => 42);
    manager.addTask({ id: 'data', interval: 1000, fn });

    await vi.advanceTimersByTimeAsync(0);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(manager.getSystemStats().tasks['data']).toMatchObject({
      totalRuns: 2,
      successes: 2,
      failures: 0,
    });
  });

  it('counts a failed run and tries again on the next cycle only', async () => {
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue(7);
    manager.addTask({ id: 'flaky', interval: 1000, fn });

    await vi.advanceTimersByTimeAsync(0);
    expect(manager.getSystemStats().tasks['flaky']).toMatchObject({
      totalRuns: 1,
      failures: 1,
      lastError: expect.objectContaining({ message: 'boom' }),
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(manager.getSystemStats().tasks['flaky']).toMatchObject({
      totalRuns: 2,
      failures: 1,
      successes: 1,
      lastError: null,
    });
  });

  it('fails a run that exceeds the task timeout', async () => {
    manager.addTask({
      id: 'slow',
      interval: 1000,
      fn: () => new Promise<never>(() => undefined),
      taskTimeout: 50,
    });

    await vi.advanceTimersByTimeAsync(50);
    const stats = manager.getSystemStats().tasks['slow'];
    expect(stats?.failures).toBe(1);
    expect(stats?.lastError).toBeInstanceOf(PollingManagerError);
    expect(stats?.lastError?.message).toBe('Task slow timed out after 50ms');
  });

  it('stops and restarts a task', async () => {
    const fn = vi.fn(async () => 1);
    manager.addTask({ id: 'once', interval: 100, fn });
    await vi.advanceTimersByTimeAsync(0);

    manager.stopTask('once');
    expect(manager.getSystemStats().runningTasks).toBe(0);
    await vi.advanceTimersByTimeAsync(1000);
    expect(fn).toHaveBeenCalledTimes(1);

    manager.startTask('once');
    await vi.advanceTimersByTimeAsync(0);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('keeps one run in flight when restarted mid-run', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fn = vi.fn(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise(resolve => setTimeout(resolve, 500));
      inFlight--;
    });
    manager.addTask({ id: 't', interval: 1000, fn, taskTimeout: 2000 });

    await vi.advanceTimersByTimeAsync(10);
    manager.stopTask('t');
    manager.startTask('t');

    await vi.advanceTimersByTimeAsync(490);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(maxInFlight).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(maxInFlight).toBe(1);
  });

  it('does not schedule again when stopped mid-run', async () => {
    const fn = vi.fn(() => new Promise<void>(resolve => setTimeout(resolve, 100)));
    manager.addTask({ id: 't', interval: 200, fn });

    await vi.advanceTimersByTimeAsync(10);
    manager.stopTask('t');
    await vi.advanceTimersByTimeAsync(2000);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(manager.getSystemStats().tasks['t']?.successes).toBe(1);
  });

  it('validates tasks and ids', () => {
    const fn = async () => 1;
    manager.addTask({ id: 'a', interval: 100, fn });
    expect(() => manager.addTask({ id: 'a', interval: 100, fn })).toThrow(
      PollingTaskAlreadyExistsError
    );
    expect(() => manager.addTask({ id: 'b', interval: 0, fn })).toThrow(
      PollingTaskValidationError
    );
    expect(() => manager.addTask({ id: 'c', interval: 100, fn, taskTimeout: 0 })).toThrow(
      'Task timeout must be a positive number'
    );
    expect(() => manager.addTask({ id: '', interval: 100, fn })).toThrow('Task must have an "id"');
    expect(() => manager.startTask('missing')).toThrow(PollingTaskNotFoundError);
    expect(manager.hasTask('a')).toBe(true);
    expect(manager.hasTask('b')).toBe(false);
  });

  it('summarises every task', async () => {
    manager.addTask({ id: 'x', interval: 100, fn: async () => 1 });
    manager.addTask({ id: 'y', interval: 100, fn: async () => 2 });
    manager.stopTask('y');
    await vi.advanceTimersByTimeAsync(0);

    const stats = manager.getSystemStats();
    expect(stats.totalTasks).toBe(2);
    expect(stats.runningTasks).toBe(1);
    expect(Object.keys(stats.tasks)).toEqual(['x', 'y']);
    expect(stats.tasks['y']?.totalRuns).toBe(0);
  });
});
