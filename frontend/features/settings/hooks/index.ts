export { useSettingsState, useSettingsViewModel } from './useSettingsViewModel';
