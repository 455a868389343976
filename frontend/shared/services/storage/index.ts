export { createMemoryStorage, getDefaultStorage, type MemoryStorage } from './memoryStorage';
