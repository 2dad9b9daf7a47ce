export * from './loader';
export type * from './types';
export { validateConfig } from './schema';
