export * from './dispatch/slotPool';
export * from './dispatch/requestDispatcher';
export * from './session/sessionStore';
export * from './usage/usageLogger';
export * from './supervisor/modelProcessSupervisor';
export * from './resources/lifecycle';
export * from './gateway/gateway';
