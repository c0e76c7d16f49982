/**
 * Weather Ingest — Module Entry Point
 */

export * from './types';
export * from './errors';
export * from './locations';
export * from './time';
export * from './digest';
export * from './partition';
export * from './normalize';
export * from './csv';
export * from './secrets';
export * from './config';
export * from './storage/storage';
export * from './storage/s3-storage';
export * from './storage/fs-storage';
export * from './storage/factory';
export * from './storage/writer';
export * from './upstream/cache';
export * from './upstream/http';
export * from './upstream/openmeteo';
export * from './upstream/openweather';
export * from './pipeline/run';
export * from './pipeline/pool';
export * from './pipeline/batched';
export * from './pipeline/per-call';
export * from './pipeline/orchestrator';
