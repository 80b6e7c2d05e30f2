export * from './openai';
export * from './fake';
