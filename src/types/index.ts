/**
 * Main type exports
 */

export * from './metrics.js';
export * from './schemas/index.js';
