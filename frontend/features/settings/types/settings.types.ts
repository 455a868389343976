// Settings feature types

export type RecognitionPeriod =
  | 'NEVER'
  | 'SECONDS_30'
  | 'MINUTES_1'
  | 'MINUTES_2'
  | 'MINUTES_3'
  | 'MINUTES_5'
  | 'MINUTES_10';

export type RecognitionBuffer = 'NONE' | 'SECONDS_5' | 'SECONDS_10' | 'SECONDS_15' | 'SECONDS_20';

/**
 * How far back the history summary reaches. Declaration order is the tier rank.
 */
export type HistorySummaryDays =
  | 'ONE_DAY'
  | 'ONE_WEEK'
  | 'TWO_WEEKS'
  | 'ONE_MONTH'
  | 'TWO_MONTHS'
  | 'ONE_YEAR';

export interface TimedOption {
  seconds: number;
  label: string;
}

export interface HistorySummaryOption {
  value: HistorySummaryDays;
  days: number;
  label: string;
}

/** Screens reachable from the settings screen */
export type SettingsDestination = 'recognition-period' | 'recognition-buffer' | 'bedtime' | 'advanced';

export type SettingsRoute = 'settings' | SettingsDestination;

/** Persisted preference values */
export interface PreferenceValues {
  recognitionPeriod: RecognitionPeriod;
  recognitionBuffer: RecognitionBuffer;
  triggerWhenScreenOn: boolean;
  bedtimeModeEnabled: boolean;
  showAlbumArt: boolean;
  useOnlineAfterLocalFailed: boolean;
  /** Raw day count, resolved with historySummaryDaysFor() */
  historySummaryDays: number;
}

export type PreferenceKey = keyof PreferenceValues;

export interface SettingsLoadingState {
  readonly status: 'loading';
}

export interface SettingsLoadedState {
  readonly status: 'loaded';
  readonly recognitionPeriod: RecognitionPeriod;
  readonly recognitionBuffer: RecognitionBuffer;
  readonly triggerWhenScreenOn: boolean;
  readonly bedtimeMode: boolean;
  readonly albumArtEnabled: boolean;
  readonly useOnlineAfterLocalFailed: boolean;
  readonly supportsSummary: boolean;
  readonly historySummaryDays: HistorySummaryDays;
}

/** Display state of the settings screen */
export type SettingsViewState = SettingsLoadingState | SettingsLoadedState;
