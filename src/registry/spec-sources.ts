/**
 * Agent Spec Sources - Raw storage behind the agent spec store
 *
 * Sources hand back unvalidated content; validation is the store's job and
 * happens on every read.
 *
 * @module registry/spec-sources
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import * as yaml from 'js-yaml';
import type { Logger } from 'pino';
import { CanaryError, SchemaViolationError, errnoCode } from '../api/errors.js';
import type { AgentSpec } from '../types/schemas/agent-spec.js';

/**
 * Unvalidated spec content and where it came from
 */
export interface RawAgentSpec {
  content: unknown;
  location: string;
}

/**
 * Storage for agent specs, keyed by agent name
 */
export interface AgentSpecSource {
  /** Agent names present in storage, in any order */
  listNames(): Promise<string[]>;

  /** Raw content for an agent, or undefined if there is none */
  read(name: string): Promise<RawAgentSpec | undefined>;

  /** Replace the stored spec for an agent */
  write(name: string, spec: AgentSpec): Promise<void>;
}

const SPEC_EXTENSIONS = ['.yaml', '.yml'] as const;
const SAFE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * One YAML file per agent: `<dir>/<name>.yaml`
 */
export class FileAgentSpecSource implements AgentSpecSource {
  private readonly dir: string;
  private readonly logger?: Logger;

  constructor(dir: string, logger?: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  async listNames(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.logger?.warn({ dir: this.dir }, 'Agent spec directory not found');
        return [];
      }
      throw error;
    }

    const names = new Set<string>();
    for (const entry of entries) {
      const ext = path.extname(entry);
      if (SPEC_EXTENSIONS.some((candidate) => candidate === ext)) {
        names.add(path.basename(entry, ext));
      }
    }
    return [...names];
  }

  async read(name: string): Promise<RawAgentSpec | undefined> {
    if (!SAFE_NAME_PATTERN.test(name)) {
      return undefined;
    }

    for (const ext of SPEC_EXTENSIONS) {
      const location = path.join(this.dir, `${name}${ext}`);
      let text: string;
      try {
        text = await fs.readFile(location, 'utf8');
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          continue;
        }
        throw new CanaryError('PersistenceError', `Failed to read agent spec ${location}`, {
          location,
          cause: String(error),
        });
      }

      try {
        return { content: yaml.load(text), location };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SchemaViolationError(`agent spec ${name}`, [
          { field: 'root', message: `Invalid YAML: ${reason}` },
        ]);
      }
    }

    return undefined;
  }

  async write(name: string, spec: AgentSpec): Promise<void> {
    if (!SAFE_NAME_PATTERN.test(name)) {
      throw new CanaryError('SchemaViolation', `Invalid agent name for a file: ${name}`);
    }

    await fs.mkdir(this.dir, { recursive: true });
    const location = path.join(this.dir, `${name}.yaml`);
    const tmpPath = `${location}.${process.pid}.tmp`;

    // Write-then-rename so readers never see a half-written spec
    await fs.writeFile(tmpPath, yaml.dump(spec, { noRefs: true, skipInvalid: true }), 'utf8');
    await fs.rename(tmpPath, location);

    this.logger?.info({ agent: name, location }, 'Agent spec written');
  }
}

/**
 * Specs held in memory (tests and embedding)
 */
export class InMemoryAgentSpecSource implements AgentSpecSource {
  private readonly specs = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [name, content] of Object.entries(initial)) {
      this.specs.set(name, structuredClone(content));
    }
  }

  async listNames(): Promise<string[]> {
    return [...this.specs.keys()];
  }

  async read(name: string): Promise<RawAgentSpec | undefined> {
    if (!this.specs.has(name)) {
      return undefined;
    }
    return { content: structuredClone(this.specs.get(name)), location: `memory:${name}` };
  }

  async write(name: string, spec: AgentSpec): Promise<void> {
    this.specs.set(name, structuredClone(spec));
  }

  /**
   * Replace raw content without validation (simulates an external edit)
   */
  set(name: string, content: unknown): void {
    this.specs.set(name, structuredClone(content));
  }
}
