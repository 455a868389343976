// Features barrel export
// Re-export all feature modules for centralized access

export * from './settings';
