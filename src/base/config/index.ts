/**
 * Configuration System
 */

export * from './types.js';
export { loadConfig } from './loader.js';
