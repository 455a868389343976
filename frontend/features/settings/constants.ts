// Settings feature configuration

import type { PreferenceValues } from './types';

/** localStorage key of the persisted preferences blob */
export const PREFERENCES_STORAGE_KEY = 'recognition-preferences';
export const PREFERENCES_STORAGE_VERSION = 1;

export const DEFAULT_PREFERENCES: PreferenceValues = {
  recognitionPeriod: 'MINUTES_1',
  recognitionBuffer: 'SECONDS_5',
  triggerWhenScreenOn: true,
  bedtimeModeEnabled: false,
  showAlbumArt: true,
  useOnlineAfterLocalFailed: false,
  historySummaryDays: 30,
};

// Toast durations (ms)
export const NOTIFICATION_DURATION_MS = {
  short: 2000,
  long: 3500,
} as const;

export const HISTORY_SUMMARY_ADVISORY =
  'Summaries covering two months or more can take a while to build and will use more storage.';

/** First recognition service build that can summarise and edit history */
export const SUMMARY_AND_EDITING_MIN_VERSION_CODE = 227;
