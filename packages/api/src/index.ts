export * from './gateway-api';
export * from './http-errors';
export * from './schemas';
