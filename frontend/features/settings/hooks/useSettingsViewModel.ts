// React bindings for the settings view model

import { useEffect, useState } from 'react';
import { useStore } from 'zustand';
import { createStore } from 'zustand/vanilla';
import {
  createSettingsViewModel,
  SETTINGS_LOADING_STATE,
  type SettingsViewModel,
  type SettingsViewModelDependencies,
} from '../state';
import type { SettingsViewState } from '../types';

// Read while no view model is mounted yet
const loadingStore = createStore<SettingsViewState>()(() => SETTINGS_LOADING_STATE);

/**
 * Create a settings view model for the lifetime of the calling component.
 *
 * The view model is created after mount and disposed on unmount or when
 * `dependencies` changes identity, so pass a stable (memoised) object.
 * Returns null until the first effect has run.
 */
export function useSettingsViewModel(
  dependencies: SettingsViewModelDependencies
): SettingsViewModel | null {
  const [viewModel, setViewModel] = useState<SettingsViewModel | null>(null);

  useEffect(() => {
    const created = createSettingsViewModel(dependencies);
    setViewModel(created);

    return () => {
      created.dispose();
    };
  }, [dependencies]);

  return viewModel;
}

/**
 * Subscribe to a view model's display state; loading while it is null
 */
export function useSettingsState(viewModel: SettingsViewModel | null): SettingsViewState {
  return useStore(viewModel?.state ?? loadingStore);
}
