// In-memory key/value storage for hosts without localStorage (Node, tests)

import type { StateStorage } from 'zustand/middleware';

export interface MemoryStorage extends StateStorage {
  getItem: (name: string) => string | null;
  setItem: (name: string, value: string) => void;
  removeItem: (name: string) => void;
  /** Remove every entry */
  clear: () => void;
  /** Number of stored entries */
  readonly size: number;
}

export function createMemoryStorage(initial: Record<string, string> = {}): MemoryStorage {
  const entries = new Map<string, string>(Object.entries(initial));

  return {
    getItem: (name) => entries.get(name) ?? null,
    setItem: (name, value) => {
      entries.set(name, value);
    },
    removeItem: (name) => {
      entries.delete(name);
    },
    clear: () => entries.clear(),
    get size() {
      return entries.size;
    },
  };
}

/**
 * Browser localStorage when the host provides one, otherwise a fresh in-memory store
 */
export function getDefaultStorage(): StateStorage {
  if (typeof globalThis.localStorage !== 'undefined') {
    return globalThis.localStorage;
  }
  console.warn('[storage] localStorage unavailable, preferences will not survive a restart');
  return createMemoryStorage();
}
