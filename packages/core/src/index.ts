export * from './entities';
export type * from './ports';
export * from './config';
export * from './errors';
export * from './utils';
export * from './validation';
export type { RuntimeResource } from './lifecycle';
