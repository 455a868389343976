// Shared barrel export
// Re-export all shared modules

export * from './services';
export * from './state';
