// Shared services barrel export
// Re-export all shared services

export * from './storage';
