/**
 * Agent Registry - Validated agent specifications
 *
 * @module registry
 * @packageDocumentation
 */

export {
  AgentSpecStore,
  type AgentValidationResult,
  type ReadinessReport,
} from './agent-spec-store.js';

export {
  FileAgentSpecSource,
  InMemoryAgentSpecSource,
  type AgentSpecSource,
  type RawAgentSpec,
} from './spec-sources.js';

export { scanSecurityFlags, type SecurityFinding } from './security-scanner.js';
