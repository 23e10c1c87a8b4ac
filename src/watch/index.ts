export { create } from './source';
export * from './types';
