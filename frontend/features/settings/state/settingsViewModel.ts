/**
 * Settings screen view model
 *
 * Folds the settings screen's preference cells into one display state and turns
 * user intents into preference writes or navigation. Everything it starts lives
 * on one LifecycleScope; dispose() ends the subscription and drops queued work.
 */

import { combineLatest, LifecycleScope, type ScopeErrorHandler } from '@/shared/state';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { HISTORY_SUMMARY_ADVISORY } from '../constants';
import type { CapabilityService } from '../services/capabilityService';
import type { NotificationService } from '../services/notificationService';
import type { NavigationService, SettingsPreferences } from '../stores';
import type {
  HistorySummaryDays,
  SettingsLoadedState,
  SettingsLoadingState,
  SettingsViewState,
} from '../types';
import {
  getHistorySummaryDays,
  historySummaryDaysFor,
  isHistorySummaryAtLeast,
} from '../utils/historySummaryDays';

export const SETTINGS_LOADING_STATE: SettingsViewState = Object.freeze<SettingsLoadingState>({
  status: 'loading',
});

export interface SettingsViewModelDependencies {
  preferences: SettingsPreferences;
  capabilities: CapabilityService;
  navigation: NavigationService;
  notifications: NotificationService;
  /** Receives failures from commands and from combining state. Logs by default. */
  onError?: ScopeErrorHandler;
}

export interface SettingsViewModel {
  /** Latest display state; starts as loading */
  readonly state: StoreApi<SettingsViewState>;

  onRecognitionPeriodClicked: () => void;
  onRecognitionBufferClicked: () => void;
  onTriggerWhenScreenOnChanged: (enabled: boolean) => void;
  onBedtimeClicked: () => void;
  onAdvancedClicked: () => void;
  onAlbumArtChanged: (enabled: boolean) => void;
  onUseOnlineAfterLocalFailedChanged: (enabled: boolean) => void;
  onHistorySummaryDaysChanged: (days: HistorySummaryDays) => void;

  /** Resolves once every launched command has finished */
  whenIdle: () => Promise<void>;
  dispose: () => void;
}

export function createSettingsViewModel({
  preferences,
  capabilities,
  navigation,
  notifications,
  onError,
}: SettingsViewModelDependencies): SettingsViewModel {
  const scope = new LifecycleScope('settingsViewModel', onError);
  const state = createStore<SettingsViewState>()(() => SETTINGS_LOADING_STATE);

  const recognition = combineLatest({
    period: preferences.recognitionPeriod.observe,
    buffer: preferences.recognitionBuffer.observe,
  });

  const inputs = combineLatest({
    recognition,
    screenOn: preferences.triggerWhenScreenOn.observe,
    bedtime: preferences.bedtimeModeEnabled.observe,
    albumArt: preferences.showAlbumArt.observe,
    useOnlineAfterLocalFailed: preferences.useOnlineAfterLocalFailed.observe,
    days: preferences.historySummaryDays.observe,
  });

  let unsubscribe: (() => void) | null = null;
  let failed = false;

  const stopAggregating = () => {
    unsubscribe?.();
    unsubscribe = null;
  };

  unsubscribe = inputs((values) => {
    if (failed) return;
    try {
      const loaded: SettingsLoadedState = {
        status: 'loaded',
        recognitionPeriod: values.recognition.period,
        recognitionBuffer: values.recognition.buffer,
        triggerWhenScreenOn: values.screenOn,
        bedtimeMode: values.bedtime,
        albumArtEnabled: values.albumArt,
        useOnlineAfterLocalFailed: values.useOnlineAfterLocalFailed,
        // Queried on every update, never cached
        supportsSummary: capabilities.doesSupportSummaryAndEditing(),
        historySummaryDays: historySummaryDaysFor(values.days),
      };
      state.setState(Object.freeze(loaded), true);
    } catch (error) {
      failed = true;
      stopAggregating();
      scope.fail(error);
    }
  });

  // The first delivery may have failed before `unsubscribe` was assigned
  if (failed) stopAggregating();
  scope.addDisposer(stopAggregating);

  return {
    state,

    onRecognitionPeriodClicked: () => {
      scope.launch(() => navigation.navigate('recognition-period'));
    },

    onRecognitionBufferClicked: () => {
      scope.launch(() => navigation.navigate('recognition-buffer'));
    },

    onTriggerWhenScreenOnChanged: (enabled) => {
      scope.launch(() => preferences.triggerWhenScreenOn.set(enabled));
    },

    onAlbumArtChanged: (enabled) => {
      scope.launch(() => preferences.showAlbumArt.set(enabled));
    },

    onUseOnlineAfterLocalFailedChanged: (enabled) => {
      scope.launch(() => preferences.useOnlineAfterLocalFailed.set(enabled));
    },

    onHistorySummaryDaysChanged: (days) => {
      scope.launch(async () => {
        // Shown on every qualifying change, not only when the tier goes up
        if (isHistorySummaryAtLeast(days, 'TWO_MONTHS')) {
          notifications.show(HISTORY_SUMMARY_ADVISORY, 'long');
        }
        await preferences.historySummaryDays.set(getHistorySummaryDays(days));
      });
    },

    onBedtimeClicked: () => {
      scope.launch(() => navigation.navigate('bedtime'));
    },

    onAdvancedClicked: () => {
      scope.launch(() => navigation.navigate('advanced'));
    },

    whenIdle: () => scope.whenIdle(),

    dispose: () => scope.dispose(),
  };
}
