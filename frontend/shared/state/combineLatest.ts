// Latest-value join over named sources

import type { Source, Unsubscribe } from './types';

export type SourceMap<T extends Record<string, unknown>> = {
  [K in keyof T]: Source<T[K]>;
};

function hasEverySlot<T extends Record<string, unknown>>(
  latest: Partial<T>,
  keys: ReadonlyArray<keyof T>
): latest is T {
  return keys.every((key) => key in latest);
}

/**
 * Joins named sources into one source of records.
 *
 * Nothing is emitted until every slot has received a value. After that, each
 * emission from any slot produces one record carrying that value and the most
 * recent value of every other slot.
 *
 * @example
 * const recognition = combineLatest({ period: periodCell.observe, buffer: bufferCell.observe });
 * const stop = recognition(({ period, buffer }) => render(period, buffer));
 */
export function combineLatest<T extends Record<string, unknown>>(
  sources: SourceMap<T>
): Source<T> {
  return (listener) => {
    const keys: Array<keyof T> = [];
    const latest: Partial<T> = {};
    const unsubscribes: Unsubscribe[] = [];
    let subscribing = true;
    let closed = false;

    for (const key in sources) {
      keys.push(key);
    }

    const publish = () => {
      if (closed || subscribing || !hasEverySlot(latest, keys)) return;
      listener({ ...latest });
    };

    for (const key in sources) {
      const source = sources[key];
      unsubscribes.push(
        source((value) => {
          latest[key] = value;
          publish();
        })
      );
    }

    // Sources that replay synchronously fill their slots during the loop above;
    // the first record goes out once all of them are attached.
    subscribing = false;
    publish();

    return () => {
      closed = true;
      unsubscribes.forEach((unsubscribe) => unsubscribe());
    };
  };
}
