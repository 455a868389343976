/**
 * Unit tests for LifecycleScope
 *
 * Test Coverage:
 * - Tasks never run on the caller's stack
 * - whenIdle waits for every in-flight task
 * - Failures reach the error handler
 * - dispose aborts, drops pending tasks, runs disposers in reverse order
 */

import { describe, expect, it, vi } from 'vitest';
import { LifecycleScope } from './lifecycleScope';

describe('LifecycleScope', () => {
  it('should run launched tasks asynchronously', async () => {
    const scope = new LifecycleScope('test');
    const task = vi.fn();

    scope.launch(task);
    expect(task).not.toHaveBeenCalled();

    await scope.whenIdle();
    expect(task).toHaveBeenCalledTimes(1);
    expect(task).toHaveBeenCalledWith(scope.signal);
  });

  it('should wait for async tasks in whenIdle', async () => {
    const scope = new LifecycleScope('test');
    const order: string[] = [];

    scope.launch(async () => {
      await Promise.resolve();
      order.push('first');
    });
    scope.launch(() => {
      order.push('second');
    });

    await scope.whenIdle();
    expect(order).toEqual(['second', 'first']);
  });

  it('should report task failures to the error handler', async () => {
    const onError = vi.fn();
    const scope = new LifecycleScope('test', onError);
    const failure = new Error('write failed');

    scope.launch(async () => {
      throw failure;
    });
    await scope.whenIdle();

    expect(onError).toHaveBeenCalledWith(failure);
    expect(scope.isActive).toBe(true);
  });

  it('should log failures when no handler is given', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const scope = new LifecycleScope('settings');
    const failure = new Error('boom');

    scope.launch(() => {
      throw failure;
    });
    await scope.whenIdle();

    expect(consoleError).toHaveBeenCalledWith('[settings] Unhandled error in scope:', failure);
    consoleError.mockRestore();
  });

  it('should drop tasks that have not started when disposed', async () => {
    const onError = vi.fn();
    const scope = new LifecycleScope('test', onError);
    const task = vi.fn();

    scope.launch(task);
    scope.dispose();
    await scope.whenIdle();

    expect(task).not.toHaveBeenCalled();
    expect(onError).not.toHaveBeenCalled();
  });

  it('should ignore launches after dispose', async () => {
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const scope = new LifecycleScope('test');
    const task = vi.fn();

    scope.dispose();
    scope.launch(task);
    await scope.whenIdle();

    expect(task).not.toHaveBeenCalled();
    expect(consoleWarn).toHaveBeenCalledWith('[test] Ignoring task launched after dispose');
    consoleWarn.mockRestore();
  });

  it('should abort the signal and run disposers in reverse order once', () => {
    const scope = new LifecycleScope('test');
    const order: number[] = [];

    scope.addDisposer(() => order.push(1));
    scope.addDisposer(() => order.push(2));

    scope.dispose();
    scope.dispose();

    expect(scope.isActive).toBe(false);
    expect(scope.signal.aborted).toBe(true);
    expect(order).toEqual([2, 1]);
  });

  it('should run disposers added after dispose immediately', () => {
    const scope = new LifecycleScope('test');
    const disposer = vi.fn();

    scope.dispose();
    scope.addDisposer(disposer);

    expect(disposer).toHaveBeenCalledTimes(1);
  });
});
