/**
 * agent-canary commands
 *
 * Usage:
 *   agent-canary list [--state <state>] [--json]
 *   agent-canary deploy <agent> <config.yaml> [--split <pct>] [--duration-minutes <m>] [--min-samples <n>]
 *   agent-canary evaluate <id>
 *   agent-canary promote <id>
 *   agent-canary rollback <id> [--reason <text>]
 *   agent-canary ramp <id> <pct>
 *   agent-canary check-expired
 *   agent-canary show <id> [--json]
 *   agent-canary agents list | validate [name] | readiness <name>
 *   agent-canary gates <agent>
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import {
  CanaryError,
  SchemaViolationError,
  errnoCode,
  isCanaryError,
  type CanaryErrorCode,
} from '../api/errors.js';
import { loadConfig } from '../config/loader.js';
import { createToolkit, type Toolkit } from '../toolkit.js';
import { DeploymentStateSchema, type DeploymentRecord } from '../types/schemas/deployment.js';
import { createLogger } from '../utils/logger-helpers.js';

/**
 * Output sinks (console by default; tests capture lines)
 */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliContext {
  /** Use these components instead of building them from configuration */
  toolkit?: Toolkit;

  /** Time source for ages in listings (default: Date.now) */
  now?: () => number;
}

/**
 * Process exit codes (sysexits.h where one fits)
 */
export const EXIT = {
  OK: 0,
  FAILURE: 1,
  USAGE: 64,
  DATA: 65,
  NO_INPUT: 66,
  UNAVAILABLE: 69,
  SOFTWARE: 70,
  IO: 74,
  TEMP_FAIL: 75,
  CONFIG: 78,
} as const;

const EXIT_CODES: Record<CanaryErrorCode, number> = {
  SchemaViolation: EXIT.DATA,
  NotFound: EXIT.NO_INPUT,
  ConflictError: EXIT.UNAVAILABLE,
  InvalidState: EXIT.SOFTWARE,
  InsufficientSamples: EXIT.TEMP_FAIL,
  ConfigurationError: EXIT.CONFIG,
  PersistenceError: EXIT.IO,
  SuccessRateViolation: EXIT.FAILURE,
  LatencySLOViolation: EXIT.FAILURE,
  CostThresholdViolation: EXIT.FAILURE,
  SecurityViolation: EXIT.FAILURE,
  UnknownError: EXIT.FAILURE,
};

const HELP = `
agent-canary - Canary deployments with quality gates for agent configurations

USAGE:
  agent-canary <command> [options]

COMMANDS:
  list                                  List deployments, newest first
    --state <state>                     Only deployments in this state
    --json                              Output as JSON

  deploy <agent> <config.yaml>          Start a canary (config merged over the baseline)
    --split <pct>                       Traffic split, 1-100
    --duration-minutes <m>              Expire after m minutes
    --min-samples <n>                   Canary samples needed before a verdict

  evaluate <id>                         Run the quality gates (a failure rolls back)
  promote <id>                          Make the canary config the new baseline
  rollback <id>                         Stop a canary
    --reason <text>                     Reason recorded in the decision log
  ramp <id> <pct>                       Change the traffic split
  check-expired                         Expire deployments past their duration
  show <id>                             Print a deployment record
    --json                              Output as JSON

  agents list                           List valid agent specs
  agents validate [name]                Validate one or every agent spec
  agents readiness <name>               Deployment readiness of an agent
  gates <agent>                         Static quality gates of an agent spec

OPTIONS:
  --config <path>                       Configuration file (default: config/canary.yaml)
  --help                                Show this help message

ENVIRONMENT VARIABLES:
  CANARY_CONFIG                         Configuration file
  NODE_ENV                              Selects the environments override
  LOG_LEVEL                             Overrides logging.level
`;

const BOOLEAN_FLAGS = new Set(['json', 'help']);

interface CLIArgs {
  _: string[];
  flags: Map<string, string | boolean>;
}

/**
 * Wrong command line; reported with exit code 64
 */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { _: [], flags: new Map() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq >= 0) {
        result.flags.set(body.slice(0, eq), body.slice(eq + 1));
        continue;
      }

      const nextArg = args[i + 1];
      if (!BOOLEAN_FLAGS.has(body) && nextArg !== undefined && !nextArg.startsWith('--')) {
        result.flags.set(body, nextArg);
        i++;
      } else {
        result.flags.set(body, true);
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

function stringFlag(args: CLIArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  if (value === true) {
    throw new UsageError(`--${name} needs a value`);
  }
  return value === false ? undefined : value;
}

function numberFlag(args: CLIArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) {
    return undefined;
  }
  return parseNumber(value, `--${name}`);
}

function parseNumber(value: string, label: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`${label} must be a number, got "${value}"`);
  }
  return parsed;
}

function positional(args: CLIArgs, index: number, name: string): string {
  const value = args._[index];
  if (value === undefined) {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

/**
 * Age as the two most significant units: 2d3h, 4h12m, 7m, 42s
 */
export function formatAge(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  const minutes = Math.floor((seconds % 3_600) / 60);

  if (days > 0) return `${days}d${hours}h`;
  if (hours > 0) return `${hours}h${minutes}m`;
  if (minutes > 0) return `${minutes}m`;
  return `${seconds}s`;
}

function formatTable(rows: string[][]): string[] {
  const widths = rows[0].map((_, column) => Math.max(...rows.map((row) => row[column].length)));
  return rows.map((row) =>
    row
      .map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column])))
      .join('  ')
  );
}

async function readCanaryConfig(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new CanaryError('NotFound', `Config file not found: ${filePath}`, { path: filePath });
    }
    throw new CanaryError('PersistenceError', `Failed to read ${filePath}: ${String(error)}`);
  }

  try {
    return yaml.load(text) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaViolationError(filePath, [{ field: 'root', message: `Invalid YAML: ${reason}` }]);
  }
}

type CommandHandler = (
  args: CLIArgs,
  toolkit: Toolkit,
  io: CliIO,
  now: () => number
) => Promise<number>;

const listCommand: CommandHandler = async (args, toolkit, io, now) => {
  const stateFlag = stringFlag(args, 'state');
  let state: DeploymentRecord['state'] | undefined;
  if (stateFlag !== undefined) {
    const parsed = DeploymentStateSchema.safeParse(stateFlag.toUpperCase());
    if (!parsed.success) {
      throw new UsageError(parsed.error.issues[0]?.message ?? `Unknown state ${stateFlag}`);
    }
    state = parsed.data;
  }

  const records = await toolkit.manager.list(state);

  if (args.flags.get('json') === true) {
    io.stdout(JSON.stringify(records, null, 2));
    return EXIT.OK;
  }

  if (records.length === 0) {
    io.stdout('No deployments');
    return EXIT.OK;
  }

  const rows = [['ID', 'AGENT', 'STATE', 'SPLIT', 'AGE']];
  for (const record of records) {
    rows.push([
      record.id,
      record.agentName,
      record.state,
      `${record.trafficSplitPercent}%`,
      formatAge(now() - Date.parse(record.createdAt)),
    ]);
  }
  formatTable(rows).forEach((line) => io.stdout(line));
  return EXIT.OK;
};

const deployCommand: CommandHandler = async (args, toolkit, io) => {
  const agentName = positional(args, 1, 'agent');
  const configPath = positional(args, 2, 'config.yaml');
  const durationMinutes = numberFlag(args, 'duration-minutes');

  const record = await toolkit.manager.create(agentName, await readCanaryConfig(configPath), {
    trafficSplitPercent: numberFlag(args, 'split'),
    durationMs: durationMinutes === undefined ? undefined : durationMinutes * 60_000,
    minSampleSize: numberFlag(args, 'min-samples'),
  });

  io.stdout(
    `Created deployment ${record.id} for ${record.agentName} (${record.trafficSplitPercent}% traffic, expires ${record.expiresAt})`
  );
  return EXIT.OK;
};

const evaluateCommand: CommandHandler = async (args, toolkit, io) => {
  const id = positional(args, 1, 'id');
  const verdict = await toolkit.manager.evaluate(id);

  if (verdict.passed) {
    io.stdout(`PASS ${id} (${verdict.sampleSize} canary samples)`);
    return EXIT.OK;
  }

  io.stdout(`FAIL ${id} (${verdict.sampleSize} canary samples); deployment rolled back`);
  verdict.reasons.forEach((reason) => io.stdout(`  - ${reason}`));
  return EXIT.FAILURE;
};

const promoteCommand: CommandHandler = async (args, toolkit, io) => {
  const record = await toolkit.manager.promote(positional(args, 1, 'id'));
  io.stdout(`Promoted ${record.id}: ${record.agentName} baseline is now ${record.canaryHash}`);
  return EXIT.OK;
};

const rollbackCommand: CommandHandler = async (args, toolkit, io) => {
  const reason = stringFlag(args, 'reason') ?? 'Manual rollback';
  const record = await toolkit.manager.rollback(positional(args, 1, 'id'), reason);
  io.stdout(`Rolled back ${record.id} (${reason})`);
  return EXIT.OK;
};

const rampCommand: CommandHandler = async (args, toolkit, io) => {
  const id = positional(args, 1, 'id');
  const percent = parseNumber(positional(args, 2, 'pct'), '<pct>');
  const record = await toolkit.manager.setTrafficSplit(id, percent);
  io.stdout(`Traffic split for ${record.id} is now ${record.trafficSplitPercent}%`);
  return EXIT.OK;
};

const checkExpiredCommand: CommandHandler = async (_args, toolkit, io) => {
  const expired = await toolkit.manager.checkExpired();
  io.stdout(`Expired ${expired.length} deployment(s)`);
  expired.forEach((record) => io.stdout(`  ${record.id} ${record.agentName}`));
  return EXIT.OK;
};

const showCommand: CommandHandler = async (args, toolkit, io) => {
  const record = await toolkit.manager.get(positional(args, 1, 'id'));
  io.stdout(
    args.flags.get('json') === true
      ? JSON.stringify(record, null, 2)
      : yaml.dump(record, { noRefs: true }).trimEnd()
  );
  return EXIT.OK;
};

const agentsCommand: CommandHandler = async (args, toolkit, io) => {
  const subcommand = positional(args, 1, 'list|validate|readiness');

  if (subcommand === 'list') {
    const specs = await toolkit.specs.list();
    if (specs.length === 0) {
      io.stdout('No valid agent specs');
      return EXIT.OK;
    }
    const rows = [['NAME', 'VERSION', 'MODEL']];
    specs.forEach((spec) => rows.push([spec.name, spec.version, `${spec.provider}/${spec.model}`]));
    formatTable(rows).forEach((line) => io.stdout(line));
    return EXIT.OK;
  }

  if (subcommand === 'validate') {
    const name = args._[2];
    const all = await toolkit.specs.validateAll();
    const results = name === undefined ? all : all.filter((result) => result.name === name);

    if (name !== undefined && results.length === 0) {
      throw new CanaryError('NotFound', `Unknown agent: ${name}`, { kind: 'agent', key: name });
    }

    let invalid = 0;
    for (const result of results) {
      if (result.verdict.passed) {
        io.stdout(`OK       ${result.name}`);
      } else {
        invalid++;
        io.stdout(`INVALID  ${result.name}`);
        result.verdict.reasons.forEach((reason) => io.stdout(`  - ${reason}`));
      }
    }
    return invalid === 0 ? EXIT.OK : EXIT.DATA;
  }

  if (subcommand === 'readiness') {
    const report = await toolkit.specs.readiness(positional(args, 2, 'name'));
    io.stdout(`${report.ready ? 'READY' : 'BLOCKED'} ${report.agent}${report.version ? ` ${report.version}` : ''}`);
    report.blockers.forEach((blocker) => io.stdout(`  blocker: ${blocker}`));
    report.warnings.forEach((warning) => io.stdout(`  warning: ${warning}`));
    return report.ready ? EXIT.OK : EXIT.DATA;
  }

  throw new UsageError(`Unknown agents subcommand: ${subcommand}`);
};

const gatesCommand: CommandHandler = async (args, toolkit, io) => {
  const spec = await toolkit.specs.get(positional(args, 1, 'agent'));
  const verdict = toolkit.quality.evaluateStatic(spec);

  io.stdout(`${verdict.passed ? 'PASS' : 'FAIL'} ${spec.name} static gates`);
  verdict.reasons.forEach((reason) => io.stdout(`  - ${reason}`));
  return verdict.passed ? EXIT.OK : EXIT.FAILURE;
};

const COMMANDS: Record<string, CommandHandler> = {
  list: listCommand,
  deploy: deployCommand,
  evaluate: evaluateCommand,
  promote: promoteCommand,
  rollback: rollbackCommand,
  ramp: rampCommand,
  'check-expired': checkExpiredCommand,
  show: showCommand,
  agents: agentsCommand,
  gates: gatesCommand,
};

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/**
 * Run one command
 *
 * @returns Process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO = consoleIO,
  context: CliContext = {}
): Promise<number> {
  const args = parseArgs(argv);

  if (args.flags.get('help') === true) {
    io.stdout(HELP.trim());
    return EXIT.OK;
  }

  const command = args._[0];
  if (command === undefined) {
    io.stderr('Error: No command specified');
    io.stderr(HELP.trim());
    return EXIT.USAGE;
  }

  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    io.stderr(`Error: Unknown command: ${command}`);
    io.stderr(`Run 'agent-canary --help' for usage.`);
    return EXIT.USAGE;
  }

  let toolkit = context.toolkit;
  const ownsToolkit = toolkit === undefined;

  try {
    if (!toolkit) {
      const config = loadConfig(stringFlag(args, 'config'));
      toolkit = createToolkit(config, { logger: createLogger(config.logging.level) });
    }

    return await handler(args, toolkit, io, context.now ?? Date.now);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}`);
      io.stderr(`Run 'agent-canary --help' for usage.`);
      return EXIT.USAGE;
    }

    if (isCanaryError(error)) {
      io.stderr(`Error [${error.code}]: ${error.message}`);
      return EXIT_CODES[error.code];
    }

    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT.FAILURE;
  } finally {
    if (ownsToolkit && toolkit) {
      await toolkit.shutdown();
    }
  }
}
