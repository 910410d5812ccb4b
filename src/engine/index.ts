export * from './state-machine';
export * from './session';
export * from './results';
export * from './media-types';
