export type * from './settings.types';
