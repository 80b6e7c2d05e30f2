export * from './timeout';
export * from './retry';
export * from './text';
export * from './context';
