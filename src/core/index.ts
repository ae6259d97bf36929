export * from './logger/index.js';
export * from './errors/index.js';
export * from './events/index.js';
export * from './config/index.js';
export * from './registry/index.js';
export * from './embedding/index.js';
export * from './matcher/index.js';
export * from './telemetry/index.js';
export * from './profiles/index.js';
export * from './lifecycle/index.js';
export * from './orchestrator.js';
export { getEnv } from './env.js';
export type { Env } from './env.js';
