/**
 * Domain model exports.
 */

export * from './errors';
export * from './error-presentation';
export * from './job';
