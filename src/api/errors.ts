/**
 * Canary error utilities.
 *
 * Provides a consistent error type for every operation the registry,
 * quality gate and deployment manager expose, plus helpers to convert
 * lower-level failures (zod issues, file system errors) into errors that
 * callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API and CLI consumers.
 *
 * The quality-gate codes never travel as thrown errors; they label the
 * violations inside a verdict. They live in the same union so a CLI can
 * report either through one code path.
 */
export type CanaryErrorCode =
  | 'SchemaViolation'
  | 'ConflictError'
  | 'NotFound'
  | 'InsufficientSamples'
  | 'InvalidState'
  | 'SuccessRateViolation'
  | 'LatencySLOViolation'
  | 'CostThresholdViolation'
  | 'SecurityViolation'
  | 'ConfigurationError'
  | 'PersistenceError'
  | 'UnknownError';

/**
 * Plain error shape for JSON output and logging
 */
export interface CanaryErrorShape {
  code: CanaryErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * One violated field of a spec, config or record
 */
export interface FieldViolation {
  field: string;
  message: string;
}

/**
 * Error implementation returned by every canary component.
 */
export class CanaryError extends Error implements CanaryErrorShape {
  public readonly code: CanaryErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: CanaryErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CanaryError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): CanaryErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Spec, config or record content is malformed. Lists every violated field.
 */
export class SchemaViolationError extends CanaryError {
  public readonly subject: string;
  public readonly violations: FieldViolation[];

  constructor(subject: string, violations: FieldViolation[]) {
    const summary = violations.map((v) => `${v.field}: ${v.message}`).join('; ');
    super('SchemaViolation', `Schema violation in ${subject}: ${summary}`, {
      subject,
      violations,
    });
    this.name = 'SchemaViolationError';
    this.subject = subject;
    this.violations = violations;
  }
}

/**
 * Not enough canary samples to reach an automated verdict yet.
 *
 * This is a "try later" signal rather than a failure.
 */
export class InsufficientSamplesError extends CanaryError {
  public readonly deploymentId: string;
  public readonly observed: number;
  public readonly required: number;

  constructor(deploymentId: string, observed: number, required: number) {
    super(
      'InsufficientSamples',
      `Deployment ${deploymentId} has ${observed} canary samples, needs at least ${required}`,
      { deploymentId, observed, required }
    );
    this.name = 'InsufficientSamplesError';
    this.deploymentId = deploymentId;
    this.observed = observed;
    this.required = required;
  }
}

/**
 * Convert every zod issue into a field violation.
 *
 * @param error - Zod validation error
 * @returns One violation per issue, paths dotted ('root' for top level)
 */
export function zodIssuesToViolations(error: ZodError): FieldViolation[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'root',
    message: issue.message,
  }));
}

/**
 * Convert Zod validation error to SchemaViolationError
 *
 * @example
 * ```typescript
 * const result = AgentSpecSchema.safeParse(raw);
 * if (!result.success) {
 *   throw schemaViolationFromZod(result.error, 'agent spec spirit-a');
 * }
 * // Throws: "Schema violation in agent spec spirit-a: provider: Required; ..."
 * ```
 */
export function schemaViolationFromZod(error: ZodError, subject: string): SchemaViolationError {
  return new SchemaViolationError(subject, zodIssuesToViolations(error));
}

/**
 * Narrow an unknown error to a CanaryError, optionally of one code.
 */
export function isCanaryError(error: unknown, code?: CanaryErrorCode): error is CanaryError {
  return error instanceof CanaryError && (code === undefined || error.code === code);
}

/**
 * Map unknown errors into CanaryError instances.
 *
 * @param error - Error thrown by a collaborator
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toCanaryError(
  error: unknown,
  fallbackCode: CanaryErrorCode = 'UnknownError'
): CanaryError {
  if (error instanceof CanaryError) {
    return error;
  }

  if (error instanceof Error) {
    return new CanaryError(fallbackCode, error.message);
  }

  return new CanaryError(fallbackCode, String(error));
}

/**
 * Convenience helper for unknown ids and agents
 */
export function notFound(kind: 'agent' | 'deployment', key: string): CanaryError {
  return new CanaryError('NotFound', `Unknown ${kind}: ${key}`, { kind, key });
}

/**
 * Error code of a Node.js system error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
