export {
  createPreferenceCell,
  createPreferencesStore,
  createSettingsPreferences,
  type PreferenceCell,
  type PreferencesStore,
  type PreferencesStoreOptions,
  type SettingsPreferences,
} from './preferencesStore';
export {
  createNavigationService,
  selectCurrentRoute,
  useSettingsNavigationStore,
  type NavigationService,
  type SettingsNavigationState,
} from './navigationStore';
