export * from './llama-server';
export * from './fake';
