export type * from './logger';
export type * from './inference';
export type * from './process';
export type * from './usage-store';
