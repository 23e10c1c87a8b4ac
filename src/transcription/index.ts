export { create, buildRequestUrl } from './service';
export type { FetchFunction } from './service';
export * from './types';
