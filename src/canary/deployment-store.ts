/**
 * Deployment Record Store - Persistence contract for deployment records
 *
 * Writes are compare-and-swap on `revision`: a writer names the revision it
 * read, and the write fails with ConflictError if another writer got there
 * first.
 *
 * @module canary/deployment-store
 */

import { CanaryError } from '../api/errors.js';
import type { DeploymentRecord } from '../types/schemas/deployment.js';

export interface DeploymentRecordStore {
  /** Record by id, or undefined */
  get(id: string): Promise<DeploymentRecord | undefined>;

  /** Every readable record, in any order */
  list(): Promise<DeploymentRecord[]>;

  /** Store a new record; ConflictError if the id is taken */
  insert(record: DeploymentRecord): Promise<void>;

  /**
   * Replace a record whose stored revision equals `expectedRevision`;
   * ConflictError otherwise
   */
  put(record: DeploymentRecord, expectedRevision: number): Promise<void>;
}

export function revisionConflict(id: string, expected: number, actual?: number): CanaryError {
  return new CanaryError(
    'ConflictError',
    actual === undefined
      ? `Deployment ${id} does not exist`
      : `Deployment ${id} was modified concurrently (expected revision ${expected}, found ${actual})`,
    { id, expected, actual }
  );
}

/**
 * Records held in memory (tests and embedding)
 */
export class InMemoryDeploymentStore implements DeploymentRecordStore {
  private readonly records = new Map<string, DeploymentRecord>();

  async get(id: string): Promise<DeploymentRecord | undefined> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : undefined;
  }

  async list(): Promise<DeploymentRecord[]> {
    return [...this.records.values()].map((record) => structuredClone(record));
  }

  async insert(record: DeploymentRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new CanaryError('ConflictError', `Deployment ${record.id} already exists`, {
        id: record.id,
      });
    }
    this.records.set(record.id, structuredClone(record));
  }

  async put(record: DeploymentRecord, expectedRevision: number): Promise<void> {
    const stored = this.records.get(record.id);
    if (!stored || stored.revision !== expectedRevision) {
      throw revisionConflict(record.id, expectedRevision, stored?.revision);
    }
    this.records.set(record.id, structuredClone(record));
  }
}
