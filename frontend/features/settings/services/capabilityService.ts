// Device capability checks for the settings screen

import { SUMMARY_AND_EDITING_MIN_VERSION_CODE } from '../constants';

export interface CapabilityService {
  /** Whether the installed recognition service can summarise and edit history */
  doesSupportSummaryAndEditing: () => boolean;
}

/**
 * @param getInstalledVersionCode - version code of the installed recognition service, or null when it is not installed
 */
export function createCapabilityService(
  getInstalledVersionCode: () => number | null,
  minimumVersionCode: number = SUMMARY_AND_EDITING_MIN_VERSION_CODE
): CapabilityService {
  return {
    doesSupportSummaryAndEditing: () => {
      const versionCode = getInstalledVersionCode();
      return versionCode !== null && versionCode >= minimumVersionCode;
    },
  };
}
