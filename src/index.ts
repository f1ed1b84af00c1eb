export {
  CanaryError,
  SchemaViolationError,
  InsufficientSamplesError,
  isCanaryError,
  toCanaryError,
  type CanaryErrorCode,
  type CanaryErrorShape,
  type FieldViolation,
} from './api/errors.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toManagerConfig,
  toQualityGateConfig,
  type Environment,
} from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

export * from './registry/index.js';
export * from './metrics/index.js';
export * from './quality/index.js';
export * from './canary/index.js';

export { createToolkit, type Toolkit, type ToolkitOptions } from './toolkit.js';
export { createLogger } from './utils/logger-helpers.js';

export * from './types/index.js';
