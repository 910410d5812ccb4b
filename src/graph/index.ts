export * from './types';
export * from './node';
export * from './graph';
