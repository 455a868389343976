/**
 * Unit tests for combineLatest
 *
 * Test Coverage:
 * - Waits for every slot before the first record
 * - One record per upstream emission afterwards
 * - Replaying sources produce a single initial record
 * - Unsubscribe detaches every upstream listener
 */

import { describe, expect, it, vi } from 'vitest';
import { combineLatest } from './combineLatest';
import type { Source } from './types';

/** Manually driven source, optionally replaying a current value on subscribe */
function createSubject<T>(initial?: { value: T }) {
  const listeners = new Set<(value: T) => void>();
  let current = initial;

  const source: Source<T> = (listener) => {
    listeners.add(listener);
    if (current) listener(current.value);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    source,
    emit(value: T) {
      current = { value };
      listeners.forEach((listener) => listener(value));
    },
    listenerCount: () => listeners.size,
  };
}

describe('combineLatest', () => {
  it('should not emit until every slot has a value', () => {
    const a = createSubject<number>();
    const b = createSubject<string>();
    const listener = vi.fn();

    combineLatest({ a: a.source, b: b.source })(listener);

    a.emit(1);
    expect(listener).not.toHaveBeenCalled();

    b.emit('x');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ a: 1, b: 'x' });
  });

  it('should emit once per upstream change with the latest values of other slots', () => {
    const a = createSubject<number>();
    const b = createSubject<string>();
    const listener = vi.fn();

    combineLatest({ a: a.source, b: b.source })(listener);
    a.emit(1);
    b.emit('x');
    a.emit(2);
    b.emit('y');

    expect(listener).toHaveBeenCalledTimes(3);
    expect(listener).toHaveBeenNthCalledWith(2, { a: 2, b: 'x' });
    expect(listener).toHaveBeenNthCalledWith(3, { a: 2, b: 'y' });
  });

  it('should emit a single initial record when every source replays on subscribe', () => {
    const a = createSubject({ value: true });
    const b = createSubject({ value: 7 });
    const c = createSubject({ value: 'z' });
    const listener = vi.fn();

    combineLatest({ a: a.source, b: b.source, c: c.source })(listener);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ a: true, b: 7, c: 'z' });
  });

  it('should treat undefined as a delivered value', () => {
    const a = createSubject<number | undefined>();
    const b = createSubject({ value: 1 });
    const listener = vi.fn();

    combineLatest({ a: a.source, b: b.source })(listener);
    a.emit(undefined);

    expect(listener).toHaveBeenCalledWith({ a: undefined, b: 1 });
  });

  it('should detach from every source on unsubscribe', () => {
    const a = createSubject({ value: 1 });
    const b = createSubject({ value: 2 });
    const listener = vi.fn();

    const unsubscribe = combineLatest({ a: a.source, b: b.source })(listener);
    expect(a.listenerCount()).toBe(1);
    expect(b.listenerCount()).toBe(1);

    unsubscribe();
    a.emit(10);

    expect(a.listenerCount()).toBe(0);
    expect(b.listenerCount()).toBe(0);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should compose with another join as one slot', () => {
    const period = createSubject({ value: 'P1' });
    const buffer = createSubject({ value: 'B1' });
    const flag = createSubject({ value: false });
    const listener = vi.fn();

    const pair = combineLatest({ period: period.source, buffer: buffer.source });
    combineLatest({ pair, flag: flag.source })(listener);

    buffer.emit('B2');

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith({
      pair: { period: 'P1', buffer: 'B2' },
      flag: false,
    });
  });
});
