import {
  ConnectionClosedError,
  logger,
  PendingLimitError,
  RemoteError,
  RequestCancelledError,
  RequestTimeoutError,
  ServerUnavailableError,
  WriteError,
  type Logger,
} from '@switchboard/core';
import {
  FailureKinds,
  NO_TARGETS_KEY,
  deriveStatus,
  type AggregatedResult,
  type FailureKind,
  type FailureOutcome,
  type ServerOutcome,
} from '@switchboard/contracts';
import { describeTarget, type Command, type CommandTarget } from '@switchboard/protocol';
import type { ServerManager } from './manager.js';
import type { StdioConnection } from './stdio-connection.js';

export interface DispatchOptions {
  /** Timeout for each server's call; defaults to the router's request timeout */
  perRequestTimeoutMs?: number;
  /** Overall bound; calls still pending when it passes are reported timed out */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface CommandRouterOptions {
  requestTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Build a result from collected outcomes
 */
export function aggregate(
  command: Command,
  target: CommandTarget,
  collected: Map<string, ServerOutcome>,
  startedAt: Date
): AggregatedResult {
  // fromEntries defines own properties, so no server name can reach the prototype
  const outcomes: Record<string, ServerOutcome> = Object.fromEntries(collected);
  return {
    method: command.method,
    target: describeTarget(target),
    status: deriveStatus(outcomes),
    outcomes,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
  };
}

export function failure(
  kind: FailureKind,
  message: string,
  durationMs = 0,
  extra: Pick<FailureOutcome, 'code' | 'details'> = {}
): FailureOutcome {
  return { status: 'failure', kind, message, durationMs, ...extra };
}

/**
 * Command Router
 *
 * Fans one command out to the connections a target resolves to and gathers
 * one outcome per server. Per-server failures never reject dispatch().
 */
export class CommandRouter {
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly manager: ServerManager,
    options: CommandRouterOptions = {}
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.log = (options.logger ?? logger).child({ component: 'router' });
  }

  async dispatch(
    command: Command,
    target: CommandTarget,
    options: DispatchOptions = {}
  ): Promise<AggregatedResult> {
    const startedAt = new Date();
    const resolved = this.manager.resolve(target);
    const outcomes = new Map<string, ServerOutcome>();

    this.log.debug(
      `[router] ${command.method} -> ${describeTarget(target)}: ` +
        `${resolved.connections.length} ready, ${resolved.unavailable.length} unavailable`
    );

    if (resolved.connections.length === 0 && (target.kind !== 'single' || resolved.unavailable.length === 0)) {
      outcomes.set(
        NO_TARGETS_KEY,
        failure(FailureKinds.NO_TARGETS_AVAILABLE, `No ready servers for ${describeTarget(target)}`, 0, {
          details: { target: describeTarget(target), unavailable: resolved.unavailable },
        })
      );
      return this.finish(command, target, outcomes, startedAt);
    }

    for (const name of resolved.unavailable) {
      const state = this.manager.getConnection(name)?.state;
      outcomes.set(
        name,
        failure(
          FailureKinds.SERVER_UNAVAILABLE,
          new ServerUnavailableError(name, state).message,
          0,
          state ? { details: { state } } : {}
        )
      );
    }

    if (resolved.connections.length > 0) {
      const settled = await this.fanOut(command, resolved.connections, options);
      for (const [name, outcome] of settled) {
        outcomes.set(name, outcome);
      }
    }

    return this.finish(command, target, outcomes, startedAt);
  }

  private async fanOut(
    command: Command,
    connections: StdioConnection[],
    options: DispatchOptions
  ): Promise<Array<[string, ServerOutcome]>> {
    const timeoutMs = options.perRequestTimeoutMs ?? this.requestTimeoutMs;
    const controller = new AbortController();
    let deadlineExpired = false;

    const deadline =
      options.deadlineMs !== undefined
        ? setTimeout(() => {
            deadlineExpired = true;
            controller.abort();
          }, options.deadlineMs)
        : null;

    const callerSignal = options.signal;
    const onCallerAbort = (): void => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      return await Promise.all(
        connections.map(async (connection): Promise<[string, ServerOutcome]> => {
          const start = Date.now();
          try {
            const payload = await connection.call(command.method, command.params, {
              timeoutMs,
              signal: controller.signal,
            });
            return [connection.name, { status: 'success', payload, durationMs: Date.now() - start }];
          } catch (err) {
            const durationMs = Date.now() - start;
            if (err instanceof RequestCancelledError && deadlineExpired && options.deadlineMs !== undefined) {
              return [connection.name, { status: 'timed_out', timeoutMs: options.deadlineMs, durationMs }];
            }
            return [connection.name, toOutcome(err, durationMs)];
          }
        })
      );
    } finally {
      if (deadline) {
        clearTimeout(deadline);
      }
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private finish(
    command: Command,
    target: CommandTarget,
    outcomes: Map<string, ServerOutcome>,
    startedAt: Date
  ): AggregatedResult {
    const result = aggregate(command, target, outcomes, startedAt);
    this.log.info(
      `[router] ${result.method} -> ${result.target}: ${result.status} ` +
        `(${Object.keys(result.outcomes).length} entries, ${result.durationMs}ms)`
    );
    return result;
  }
}

/**
 * Map a call failure onto its outcome
 */
export function toOutcome(err: unknown, durationMs: number): ServerOutcome {
  if (err instanceof RequestTimeoutError) {
    return { status: 'timed_out', timeoutMs: err.timeoutMs, durationMs };
  }
  if (err instanceof RemoteError) {
    return failure(FailureKinds.REMOTE_ERROR, err.message, durationMs, {
      code: err.remoteCode,
      ...(err.data !== undefined ? { details: { data: err.data } } : {}),
    });
  }
  if (err instanceof ConnectionClosedError) {
    return failure(FailureKinds.CONNECTION_CLOSED, err.message, durationMs);
  }
  if (err instanceof WriteError) {
    return failure(FailureKinds.WRITE_ERROR, err.message, durationMs);
  }
  if (err instanceof ServerUnavailableError) {
    return failure(FailureKinds.SERVER_UNAVAILABLE, err.message, durationMs);
  }
  if (err instanceof PendingLimitError) {
    return failure(FailureKinds.PENDING_LIMIT, err.message, durationMs, { details: { limit: err.limit } });
  }
  if (err instanceof RequestCancelledError) {
    return failure(FailureKinds.CANCELLED, err.message, durationMs);
  }
  return failure(FailureKinds.INTERNAL_ERROR, err instanceof Error ? err.message : String(err), durationMs);
}
