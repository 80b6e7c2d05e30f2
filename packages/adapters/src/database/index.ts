export * from './schema';
export * from './sqlite';
export * from './fake';
