import {
  ConfigurationError,
  loadConfig,
  logger,
  setLogLevel,
} from '@switchboard/core';
import type { AggregatedResult, OverallStatus } from '@switchboard/contracts';
import type { CommandTarget } from '@switchboard/protocol';
import { CommandRouter, ServerManager, type SpawnFn } from './downstream/index.js';

/**
 * switchboard one-shot CLI
 *
 * Usage:
 *   switchboard --config <file> --method <name> [options]
 *
 * Options:
 *   --config <file>        Server config (YAML or JSON)
 *   --method <name>        JSON-RPC method to send
 *   --params <json>        Method params as a JSON value (default: {})
 *   --target <target>      broadcast | group:<name> | server:<name> (default: broadcast)
 *   --timeout <ms>         Per-server request timeout
 *   --deadline <ms>        Overall deadline for the dispatch
 *   --log-level <level>    trace|debug|info|warn|error|fatal|silent
 */

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliArgs {
  configPath: string;
  method: string;
  params: unknown;
  target: CommandTarget;
  timeoutMs?: number;
  deadlineMs?: number;
  logLevel?: LogLevel;
}

export type ParsedCli = { help: true } | { help: false; args: CliArgs };

export const USAGE = `
Usage:
  switchboard --config <file> --method <name> [options]

Options:
  --config <file>        Server config (YAML or JSON)
  --method <name>        JSON-RPC method to send
  --params <json>        Method params as a JSON value (default: {})
  --target <target>      broadcast | group:<name> | server:<name> (default: broadcast)
  --timeout <ms>         Per-server request timeout
  --deadline <ms>        Overall deadline for the dispatch
  --log-level <level>    trace|debug|info|warn|error|fatal|silent
  --help, -h             Show this help message

Exit codes: 0 all servers succeeded, 2 partial success, 1 otherwise.
`;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Parse `broadcast`, `group:<name>` or `server:<name>`
 *
 * @throws ConfigurationError on anything else
 */
export function parseTarget(spec: string): CommandTarget {
  if (spec === 'broadcast') {
    return { kind: 'broadcast' };
  }

  const separator = spec.indexOf(':');
  const kind = separator === -1 ? '' : spec.slice(0, separator);
  const name = separator === -1 ? '' : spec.slice(separator + 1);

  if (name !== '' && kind === 'group') {
    return { kind: 'group', group: name };
  }
  if (name !== '' && kind === 'server') {
    return { kind: 'single', server: name };
  }
  throw new ConfigurationError(
    `Invalid target '${spec}': expected broadcast, group:<name> or server:<name>`
  );
}

/**
 * @throws ConfigurationError on unknown flags, missing values or invalid input
 */
export function parseArgs(argv: readonly string[]): ParsedCli {
  let configPath: string | undefined;
  let method: string | undefined;
  let params: unknown = {};
  let target: CommandTarget = { kind: 'broadcast' };
  let timeoutMs: number | undefined;
  let deadlineMs: number | undefined;
  let logLevel: LogLevel | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      return { help: true };
    }
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument '${arg}'`);
    }

    const next = argv[i + 1];
    if (next === undefined) {
      throw new ConfigurationError(`Missing value for ${arg}`);
    }
    i++;

    switch (arg) {
      case '--config':
        configPath = next;
        break;
      case '--method':
        method = next;
        break;
      case '--params':
        try {
          params = JSON.parse(next);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new ConfigurationError(`--params is not valid JSON: ${reason}`);
        }
        break;
      case '--target':
        target = parseTarget(next);
        break;
      case '--timeout':
        timeoutMs = parsePositiveInt(arg, next);
        break;
      case '--deadline':
        deadlineMs = parsePositiveInt(arg, next);
        break;
      case '--log-level':
        if (!isLogLevel(next)) {
          throw new ConfigurationError(`Invalid log level '${next}'`);
        }
        logLevel = next;
        break;
      default:
        throw new ConfigurationError(`Unknown option ${arg}`);
    }
  }

  if (!configPath) {
    throw new ConfigurationError('--config is required');
  }
  if (!method) {
    throw new ConfigurationError('--method is required');
  }

  return {
    help: false,
    args: {
      configPath,
      method,
      params,
      target,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(deadlineMs !== undefined ? { deadlineMs } : {}),
      ...(logLevel !== undefined ? { logLevel } : {}),
    },
  };
}

export function exitCodeFor(status: OverallStatus): number {
  switch (status) {
    case 'all_succeeded':
      return 0;
    case 'partial_success':
      return 2;
    case 'all_failed':
      return 1;
  }
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Process launcher; child_process.spawn when omitted */
  spawn?: SpawnFn;
}

const defaultIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

/**
 * Connect, dispatch once, print the result as JSON and shut down
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n${USAGE}`);
    return 1;
  }

  if (parsed.help) {
    io.stdout(USAGE);
    return 0;
  }

  const { args } = parsed;
  if (args.logLevel) {
    setLogLevel(args.logLevel);
  }

  let manager: ServerManager;
  let requestTimeoutMs: number;
  try {
    const config = await loadConfig(args.configPath);
    requestTimeoutMs = args.timeoutMs ?? config.defaults.request_timeout_ms;
    manager = ServerManager.fromConfig(config, io.spawn ? { connection: { spawn: io.spawn } } : {});
  } catch (err) {
    logger.error({ err }, '[cli] Failed to load configuration');
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }

  let result: AggregatedResult;
  try {
    await manager.connectAll();
    const router = new CommandRouter(manager, { requestTimeoutMs });
    result = await router.dispatch(
      { method: args.method, params: args.params },
      args.target,
      args.deadlineMs !== undefined ? { deadlineMs: args.deadlineMs } : {}
    );
  } finally {
    await manager.shutdownAll();
  }

  io.stdout(JSON.stringify(result, null, 2) + '\n');
  return exitCodeFor(result.status);
}
