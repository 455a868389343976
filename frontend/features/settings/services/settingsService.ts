// Settings business logic service

import { DEFAULT_PREFERENCES } from '../constants';
import type {
  PreferenceValues,
  RecognitionBuffer,
  RecognitionPeriod,
  TimedOption,
} from '../types';

const RECOGNITION_PERIODS: Record<RecognitionPeriod, TimedOption> = {
  NEVER: { seconds: 0, label: 'Never' },
  SECONDS_30: { seconds: 30, label: 'Every 30 seconds' },
  MINUTES_1: { seconds: 60, label: 'Every minute' },
  MINUTES_2: { seconds: 120, label: 'Every 2 minutes' },
  MINUTES_3: { seconds: 180, label: 'Every 3 minutes' },
  MINUTES_5: { seconds: 300, label: 'Every 5 minutes' },
  MINUTES_10: { seconds: 600, label: 'Every 10 minutes' },
};

const RECOGNITION_BUFFERS: Record<RecognitionBuffer, TimedOption> = {
  NONE: { seconds: 0, label: 'No buffer' },
  SECONDS_5: { seconds: 5, label: '5 seconds' },
  SECONDS_10: { seconds: 10, label: '10 seconds' },
  SECONDS_15: { seconds: 15, label: '15 seconds' },
  SECONDS_20: { seconds: 20, label: '20 seconds' },
};

function isRecognitionPeriod(value: unknown): value is RecognitionPeriod {
  return typeof value === 'string' && Object.hasOwn(RECOGNITION_PERIODS, value);
}

function isRecognitionBuffer(value: unknown): value is RecognitionBuffer {
  return typeof value === 'string' && Object.hasOwn(RECOGNITION_BUFFERS, value);
}

export const settingsService = {
  /**
   * Get default preferences
   */
  getDefaultPreferences: (): PreferenceValues => {
    return { ...DEFAULT_PREFERENCES };
  },

  isRecognitionPeriod,
  isRecognitionBuffer,

  getRecognitionPeriodLabel: (period: RecognitionPeriod): string => {
    return RECOGNITION_PERIODS[period].label;
  },

  getRecognitionBufferLabel: (buffer: RecognitionBuffer): string => {
    return RECOGNITION_BUFFERS[buffer].label;
  },

  /**
   * Period options in ascending order, for the recognition period picker
   */
  getRecognitionPeriodOptions: (): Array<TimedOption & { value: RecognitionPeriod }> => {
    return Object.entries(RECOGNITION_PERIODS)
      .flatMap(([value, option]) => (isRecognitionPeriod(value) ? [{ value, ...option }] : []))
      .sort((a, b) => a.seconds - b.seconds);
  },

  /**
   * Buffer options in ascending order, for the recognition buffer picker
   */
  getRecognitionBufferOptions: (): Array<TimedOption & { value: RecognitionBuffer }> => {
    return Object.entries(RECOGNITION_BUFFERS)
      .flatMap(([value, option]) => (isRecognitionBuffer(value) ? [{ value, ...option }] : []))
      .sort((a, b) => a.seconds - b.seconds);
  },

  /**
   * Keep the valid fields of a persisted preferences blob.
   * Fields with an unknown id or the wrong type are dropped so defaults apply.
   */
  sanitizePreferences: (persisted: unknown): Partial<PreferenceValues> => {
    if (typeof persisted !== 'object' || persisted === null) {
      return {};
    }

    const raw: Record<string, unknown> = { ...persisted };
    const sanitized: Partial<PreferenceValues> = {};

    if (isRecognitionPeriod(raw.recognitionPeriod)) {
      sanitized.recognitionPeriod = raw.recognitionPeriod;
    }
    if (isRecognitionBuffer(raw.recognitionBuffer)) {
      sanitized.recognitionBuffer = raw.recognitionBuffer;
    }
    if (typeof raw.triggerWhenScreenOn === 'boolean') {
      sanitized.triggerWhenScreenOn = raw.triggerWhenScreenOn;
    }
    if (typeof raw.bedtimeModeEnabled === 'boolean') {
      sanitized.bedtimeModeEnabled = raw.bedtimeModeEnabled;
    }
    if (typeof raw.showAlbumArt === 'boolean') {
      sanitized.showAlbumArt = raw.showAlbumArt;
    }
    if (typeof raw.useOnlineAfterLocalFailed === 'boolean') {
      sanitized.useOnlineAfterLocalFailed = raw.useOnlineAfterLocalFailed;
    }
    if (typeof raw.historySummaryDays === 'number' && Number.isInteger(raw.historySummaryDays)) {
      sanitized.historySummaryDays = raw.historySummaryDays;
    }

    return sanitized;
  },
};
