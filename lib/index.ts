export * from './compose';
export * from './config';
export { createLogger } from './console';
export * from './context';
export * from './decision';
export * from './events';
export * from './identity';
export * from './image';
export * from './ledger';
export * from './logger';
export * from './reconciler';
export * from './recreate';
export * from './rollback';
export * from './runtime';
export * from './runtime-spec';
export * from './trace';
