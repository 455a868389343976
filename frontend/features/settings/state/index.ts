export {
  createSettingsViewModel,
  SETTINGS_LOADING_STATE,
  type SettingsViewModel,
  type SettingsViewModelDependencies,
} from './settingsViewModel';
