// Preferences zustand store: persisted values exposed as observable cells

import { getDefaultStorage } from '@/shared/services/storage';
import type { Source } from '@/shared/state';
import {
  createJSONStorage,
  persist,
  subscribeWithSelector,
  type StateStorage,
} from 'zustand/middleware';
import { createStore } from 'zustand/vanilla';
import { PREFERENCES_STORAGE_KEY, PREFERENCES_STORAGE_VERSION } from '../constants';
import { settingsService } from '../services/settingsService';
import type {
  PreferenceKey,
  PreferenceValues,
  RecognitionBuffer,
  RecognitionPeriod,
} from '../types';

interface PreferencesState extends PreferenceValues {
  // Actions
  setPreference: <K extends PreferenceKey>(key: K, value: PreferenceValues[K]) => void;
  resetPreferences: () => void;
}

export interface PreferencesStoreOptions {
  storage?: StateStorage;
  name?: string;
}

/**
 * One observable, settable preference
 */
export interface PreferenceCell<T> {
  get: () => T;
  set: (value: T) => Promise<void>;
  /** Delivers the current value immediately, then every distinct change */
  observe: Source<T>;
}

export interface SettingsPreferences {
  recognitionPeriod: PreferenceCell<RecognitionPeriod>;
  recognitionBuffer: PreferenceCell<RecognitionBuffer>;
  triggerWhenScreenOn: PreferenceCell<boolean>;
  bedtimeModeEnabled: PreferenceCell<boolean>;
  showAlbumArt: PreferenceCell<boolean>;
  useOnlineAfterLocalFailed: PreferenceCell<boolean>;
  historySummaryDays: PreferenceCell<number>;
}

const pickValues = (state: PreferenceValues): PreferenceValues => ({
  recognitionPeriod: state.recognitionPeriod,
  recognitionBuffer: state.recognitionBuffer,
  triggerWhenScreenOn: state.triggerWhenScreenOn,
  bedtimeModeEnabled: state.bedtimeModeEnabled,
  showAlbumArt: state.showAlbumArt,
  useOnlineAfterLocalFailed: state.useOnlineAfterLocalFailed,
  historySummaryDays: state.historySummaryDays,
});

/**
 * Create a preferences store persisted to `storage` (localStorage by default)
 */
export const createPreferencesStore = ({
  storage,
  name = PREFERENCES_STORAGE_KEY,
}: PreferencesStoreOptions = {}) =>
  createStore<PreferencesState>()(
    subscribeWithSelector(
      persist<PreferencesState, [['zustand/subscribeWithSelector', never]], [], PreferenceValues>(
        (set) => ({
          // Initial state
          ...settingsService.getDefaultPreferences(),

          setPreference: (key, value) => {
            const patch: Partial<PreferenceValues> = {};
            patch[key] = value;
            set(patch);
          },

          resetPreferences: () => set(settingsService.getDefaultPreferences()),
        }),
        {
          name,
          version: PREFERENCES_STORAGE_VERSION,
          storage: createJSONStorage(() => storage ?? getDefaultStorage()),
          partialize: pickValues,
          merge: (persisted, current) => ({
            ...current,
            ...settingsService.sanitizePreferences(persisted),
          }),
          onRehydrateStorage: () => (_state, error) => {
            if (error) {
              console.error('[preferencesStore] Failed to restore preferences, using defaults:', error);
            }
          },
        }
      )
    )
  );

export type PreferencesStore = ReturnType<typeof createPreferencesStore>;

/**
 * Expose one key of the store as a cell
 */
export function createPreferenceCell<K extends PreferenceKey>(
  store: PreferencesStore,
  key: K
): PreferenceCell<PreferenceValues[K]> {
  return {
    get: () => store.getState()[key],
    set: async (value) => {
      store.getState().setPreference(key, value);
    },
    observe: (listener) =>
      store.subscribe((state) => state[key], (value) => listener(value), { fireImmediately: true }),
  };
}

export function createSettingsPreferences(store: PreferencesStore): SettingsPreferences {
  return {
    recognitionPeriod: createPreferenceCell(store, 'recognitionPeriod'),
    recognitionBuffer: createPreferenceCell(store, 'recognitionBuffer'),
    triggerWhenScreenOn: createPreferenceCell(store, 'triggerWhenScreenOn'),
    bedtimeModeEnabled: createPreferenceCell(store, 'bedtimeModeEnabled'),
    showAlbumArt: createPreferenceCell(store, 'showAlbumArt'),
    useOnlineAfterLocalFailed: createPreferenceCell(store, 'useOnlineAfterLocalFailed'),
    historySummaryDays: createPreferenceCell(store, 'historySummaryDays'),
  };
}
