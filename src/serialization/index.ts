export * from './api-format';
export * from './snapshot';
export * from './files';
