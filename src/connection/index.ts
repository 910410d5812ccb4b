export * from './types';
export * from './event-channel';
export * from './protocol';
export * from './retry';
export * from './readiness';
export * from './local';
export * from './remote';
