export * from './session';
export * from './inference';
export * from './usage';
export * from './health';
