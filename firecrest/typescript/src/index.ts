/**
 * FirecREST client for TypeScript.
 *
 * Staged file transfers, batch jobs and task polling over the FirecREST API,
 * with per-category call spacing shared by everything one client does.
 *
 * @packageDocumentation
 */

export * from './client/index.js';
export * from './config/index.js';
export * from './auth/index.js';
export * from './errors/index.js';
export * from './observability/index.js';
export * from './resilience/index.js';
export * from './tasks/index.js';
export * from './transfer/index.js';
export * from './transport/index.js';
export * from './services/index.js';

export const VERSION = '0.1.0';
