export * from './logger';
export * from './inference';
export * from './process';
export * from './database';
