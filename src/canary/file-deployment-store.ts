/**
 * File Deployment Store - One YAML document per deployment record
 *
 * Layout: `<dir>/<id>.yaml`, plain records an operator can read and repair
 * by hand. Records are re-validated on every read.
 *
 * Also provides {@link FileLockProvider}, which extends per-agent locking
 * across processes (two CLI invocations racing on one agent).
 *
 * @module canary/file-deployment-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import type { Logger } from 'pino';
import { CanaryError, errnoCode, isCanaryError, zodIssuesToViolations } from '../api/errors.js';
import { DeploymentRecordSchema, type DeploymentRecord } from '../types/schemas/deployment.js';
import type { DeploymentRecordStore } from './deployment-store.js';
import { revisionConflict } from './deployment-store.js';
import { KeyedMutex, type LockProvider } from './keyed-mutex.js';

const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;
const RECORD_EXTENSION = '.yaml';

function persistenceError(message: string, details: Record<string, unknown>): CanaryError {
  return new CanaryError('PersistenceError', message, details);
}

/**
 * File Deployment Store
 */
export class FileDeploymentStore implements DeploymentRecordStore {
  private readonly dir: string;
  private readonly logger?: Logger;

  constructor(dir: string, logger?: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  private recordPath(id: string): string {
    if (!ID_PATTERN.test(id)) {
      throw new CanaryError('NotFound', `Unknown deployment: ${id}`, { kind: 'deployment', key: id });
    }
    return path.join(this.dir, `${id}${RECORD_EXTENSION}`);
  }

  async get(id: string): Promise<DeploymentRecord | undefined> {
    if (!ID_PATTERN.test(id)) {
      return undefined;
    }
    return this.readRecord(this.recordPath(id));
  }

  async list(): Promise<DeploymentRecord[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw persistenceError(`Failed to list deployments in ${this.dir}`, { cause: String(error) });
    }

    const records: DeploymentRecord[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(RECORD_EXTENSION)) {
        continue;
      }
      const filePath = path.join(this.dir, entry);
      try {
        const record = await this.readRecord(filePath);
        if (record) {
          records.push(record);
        }
      } catch (error) {
        if (isCanaryError(error, 'PersistenceError')) {
          this.logger?.error({ path: filePath, err: error }, 'Skipping unreadable deployment record');
          continue;
        }
        throw error;
      }
    }
    return records;
  }

  async insert(record: DeploymentRecord): Promise<void> {
    const target = this.recordPath(record.id);
    const tmpPath = await this.writeTemp(target, record);

    try {
      // link() fails with EEXIST instead of replacing an existing record
      await fs.link(tmpPath, target);
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        throw new CanaryError('ConflictError', `Deployment ${record.id} already exists`, {
          id: record.id,
        });
      }
      throw persistenceError(`Failed to write deployment ${record.id}`, { cause: String(error) });
    } finally {
      await fs.rm(tmpPath, { force: true });
    }

    this.logger?.debug({ id: record.id, path: target }, 'Deployment record created');
  }

  async put(record: DeploymentRecord, expectedRevision: number): Promise<void> {
    const target = this.recordPath(record.id);
    const stored = await this.readRecord(target);
    if (!stored || stored.revision !== expectedRevision) {
      throw revisionConflict(record.id, expectedRevision, stored?.revision);
    }

    const tmpPath = await this.writeTemp(target, record);
    try {
      await fs.rename(tmpPath, target);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw persistenceError(`Failed to write deployment ${record.id}`, { cause: String(error) });
    }

    this.logger?.debug(
      { id: record.id, revision: record.revision, state: record.state },
      'Deployment record updated'
    );
  }

  private async writeTemp(target: string, record: DeploymentRecord): Promise<string> {
    const tmpPath = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmpPath, yaml.dump(record, { noRefs: true, skipInvalid: true }), 'utf-8');
    } catch (error) {
      throw persistenceError(`Failed to write deployment ${record.id}`, { cause: String(error) });
    }
    return tmpPath;
  }

  private async readRecord(filePath: string): Promise<DeploymentRecord | undefined> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw persistenceError(`Failed to read deployment record ${filePath}`, {
        path: filePath,
        cause: String(error),
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw persistenceError(`Corrupt deployment record ${filePath}: ${reason}`, { path: filePath });
    }

    const result = DeploymentRecordSchema.safeParse(parsed);
    if (!result.success) {
      const violations = zodIssuesToViolations(result.error);
      throw persistenceError(
        `Invalid deployment record ${filePath}: ${violations.map((v) => `${v.field}: ${v.message}`).join('; ')}`,
        { path: filePath, violations }
      );
    }

    return result.data;
  }
}

export interface FileLockOptions {
  /** Give up acquiring after this long (default: 5000ms) */
  timeoutMs?: number;

  /** Lock files older than this are considered abandoned (default: 30000ms) */
  staleMs?: number;

  /** Delay between attempts (default: 25ms) */
  retryDelayMs?: number;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Lock files (`<dir>/<key>.lock`, created exclusively) layered over an
 * in-process {@link KeyedMutex}
 */
export class FileLockProvider implements LockProvider {
  private readonly dir: string;
  private readonly mutex = new KeyedMutex();
  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly retryDelayMs: number;
  private readonly logger?: Logger;

  constructor(dir: string, options: FileLockOptions = {}, logger?: Logger) {
    this.dir = dir;
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.staleMs = options.staleMs ?? 30_000;
    this.retryDelayMs = options.retryDelayMs ?? 25;
    this.logger = logger;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, async () => {
      const lockPath = path.join(this.dir, `${encodeURIComponent(key)}.lock`);
      await this.acquire(lockPath, key);
      try {
        return await task();
      } finally {
        await fs.rm(lockPath, { force: true });
      }
    });
  }

  private async acquire(lockPath: string, key: string): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const deadline = Date.now() + this.timeoutMs;

    for (;;) {
      try {
        const handle = await fs.open(lockPath, 'wx');
        await handle.writeFile(String(process.pid), 'utf-8');
        await handle.close();
        return;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw persistenceError(`Failed to create lock ${lockPath}`, { cause: String(error) });
        }
      }

      if (await this.removeIfStale(lockPath)) {
        this.logger?.warn({ key, lockPath }, 'Removed abandoned lock file');
        continue;
      }

      if (Date.now() >= deadline) {
        throw new CanaryError(
          'ConflictError',
          `Another operation on ${key} is in progress (lock ${lockPath})`,
          { key, lockPath }
        );
      }

      await sleep(this.retryDelayMs);
    }
  }

  private async removeIfStale(lockPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(lockPath);
      if (Date.now() - stats.mtimeMs < this.staleMs) {
        return false;
      }
      await fs.rm(lockPath, { force: true });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return true;
      }
      throw persistenceError(`Failed to inspect lock ${lockPath}`, { cause: String(error) });
    }
  }
}
