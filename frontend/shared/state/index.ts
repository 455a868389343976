// Shared state barrel export

export * from './combineLatest';
export * from './lifecycleScope';
export type * from './types';
