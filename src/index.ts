/**
 * comfy-workflow-client: build, edit and run node-graph workflows against a
 * ComfyUI-compatible execution server, locally or on a remote worker.
 */

export * from './graph';
export * from './serialization';
export * from './connection';
export * from './engine';
export * from './domain';
export * from './config';
export * from './client';
export * from './logger';
