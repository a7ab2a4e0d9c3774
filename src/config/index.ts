/**
 * Config Module Index
 *
 * @module config
 */

// Schema types
export * from './schema/index.js';

// Runtime registry
export {
  getRuntimeConfig,
  setRuntimeConfig,
  resetRuntimeConfig,
} from './runtime.js';
