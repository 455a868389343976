// Settings navigation zustand store

import { create, type StoreApi } from 'zustand';
import type { SettingsDestination, SettingsRoute } from '../types';

export interface SettingsNavigationState {
  // State
  backStack: SettingsRoute[];

  // Actions
  navigate: (destination: SettingsDestination) => void;
  navigateBack: () => boolean;
  reset: () => void;
}

export interface NavigationService {
  navigate: (destination: SettingsDestination) => Promise<void>;
}

const ROOT_ROUTE: SettingsRoute = 'settings';

/**
 * Settings navigation store - back stack rooted at the settings screen
 */
export const useSettingsNavigationStore = create<SettingsNavigationState>((set, get) => ({
  // Initial state
  backStack: [ROOT_ROUTE],

  navigate: (destination) => set((state) => ({ backStack: [...state.backStack, destination] })),

  // Returns false when already at the root
  navigateBack: () => {
    const { backStack } = get();
    if (backStack.length <= 1) return false;
    set({ backStack: backStack.slice(0, -1) });
    return true;
  },

  reset: () => set({ backStack: [ROOT_ROUTE] }),
}));

export const selectCurrentRoute = (state: SettingsNavigationState): SettingsRoute =>
  state.backStack[state.backStack.length - 1] ?? ROOT_ROUTE;

export function createNavigationService(
  store: StoreApi<SettingsNavigationState> = useSettingsNavigationStore
): NavigationService {
  return {
    navigate: async (destination) => {
      store.getState().navigate(destination);
    },
  };
}
