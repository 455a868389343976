// Settings feature barrel export
// Re-export all public APIs from the settings feature

export * from './constants';
export * from './hooks';
export * from './services';
export * from './state';
export * from './stores';
export * from './types';
export * from './utils';
