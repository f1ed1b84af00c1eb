/**
 * Zod schema exports
 *
 * These schemas validate every boundary where data enters from disk or
 * from an operator: agent spec files, canary configs, persisted deployment
 * records and the runtime configuration.
 *
 * @example
 * ```typescript
 * import { AgentSpecSchema } from 'agent-canary-gate';
 *
 * const result = AgentSpecSchema.safeParse(yaml.load(text));
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Agent spec schemas
export * from './agent-spec.js';

// Deployment record schemas
export * from './deployment.js';

// Config schemas
export * from './config.js';
