import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import {
  ConnectionClosedError,
  HandshakeTimeoutError,
  logger,
  PendingLimitError,
  RemoteError,
  RequestCancelledError,
  RequestTimeoutError,
  ServerUnavailableError,
  SpawnError,
  SwitchboardError,
  WriteError,
  type Logger,
  type ProtocolError,
  type ServerDefinition,
} from '@switchboard/core';
import {
  JSONRPC_VERSION,
  RESERVED_METHODS,
  READY_MESSAGE_ID,
  type ConnectionState,
  type IncomingMessage,
  type JsonRpcNotification,
} from '@switchboard/protocol';
import { computeBackoffDelay, sleep } from './backoff.js';
import { ErrorRingBuffer, type ErrorLogEntry } from './error-ring-buffer.js';
import { StdioTransport, buildChildEnv } from './stdio-transport.js';
import type { CallOptions, ChildHandle, ConnectionOptions } from './types.js';

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  handshakeTimeoutMs: 10_000,
  requestTimeoutMs: 30_000,
  shutdownGraceMs: 5_000,
  maxPendingRequests: 100,
  maxConsecutiveDecodeErrors: 5,
  reconnect: {
    baseDelayMs: 500,
    maxDelayMs: 30_000,
    maxAttempts: 5,
    jitterRatio: 0.2,
  },
  spawn: (command, args, options) => spawn(command, [...args], options),
  random: Math.random,
  baseEnv: process.env,
};

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ['initializing', 'closed'],
  initializing: ['ready', 'degraded', 'closed'],
  ready: ['degraded', 'closed'],
  degraded: ['initializing', 'closed'],
  closed: [],
};

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
  detach: () => void;
}

interface HandshakeWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

export interface ConnectionHealthDetail {
  name: string;
  state: ConnectionState;
  pid: number | null;
  pendingRequests: number;
  consecutiveFailures: number;
  reconnectAttempts: number;
  connectedAt: string | null;
  lastActivityAt: string | null;
  uptimeMs: number | null;
  failureReason: string | null;
  serverInfo: unknown;
  recentErrors: ErrorLogEntry[];
}

/**
 * One server process and the session running over its stdio
 *
 * disconnected -> initializing -> ready <-> degraded, and closed from anywhere.
 * Requests are only written while ready. A failure that takes a ready
 * connection down rejects every pending request and hands over to a single
 * reconnect loop with exponential backoff. Closed is terminal.
 *
 * Events:
 * - `state` (next, previous, reason)
 * - `notification` (JsonRpcNotification)
 * - `reconnect-scheduled` (ReconnectScheduledEvent)
 * - `reconnect-exhausted` (ReconnectExhaustedEvent)
 */
export class StdioConnection extends EventEmitter {
  readonly name: string;
  readonly definition: ServerDefinition;

  private readonly options: ConnectionOptions;
  private readonly log: Logger;
  private readonly errors = new ErrorRingBuffer();
  private currentState: ConnectionState = 'disconnected';
  private transport: StdioTransport | null = null;
  private pending = new Map<number, PendingRequest>();
  private nextRequestId = 1;
  private handshake: HandshakeWaiter | null = null;
  private connecting: Promise<void> | null = null;
  private supervisor: Promise<void> | null = null;
  private supervisorAbort: AbortController | null = null;
  private closing: Promise<void> | null = null;
  private consecutiveFailures = 0;
  private decodeErrors = 0;
  private reconnectAttempts = 0;
  private connectedAt: number | null = null;
  private lastActivity: number | null = null;
  private failureReason: string | null = null;
  private serverInfo: unknown = null;

  constructor(definition: ServerDefinition, options: Partial<ConnectionOptions> = {}, log: Logger = logger) {
    super();
    this.name = definition.name;
    this.definition = definition;
    this.options = {
      ...DEFAULT_CONNECTION_OPTIONS,
      ...options,
      reconnect: { ...DEFAULT_CONNECTION_OPTIONS.reconnect, ...options.reconnect },
    };
    this.log = log.child({ server: definition.name });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  isReady(): boolean {
    return this.currentState === 'ready';
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Write errors, undecodable frames and failed probes since the last
   * response. A request that merely times out does not count.
   */
  get failureCount(): number {
    return this.consecutiveFailures;
  }

  /**
   * Milliseconds since the last message in either direction
   */
  idleMs(now = Date.now()): number {
    return this.lastActivity === null ? Number.POSITIVE_INFINITY : now - this.lastActivity;
  }

  /**
   * Spawn the process and wait for its ready message
   *
   * Resolves at once when already ready and joins an attempt in flight.
   * Calling it on a degraded connection cancels the backoff wait and tries
   * immediately.
   *
   * @throws SpawnError, HandshakeTimeoutError or ConnectionClosedError
   */
  async connect(): Promise<void> {
    if (this.currentState === 'ready') {
      return;
    }
    if (this.currentState === 'closed') {
      throw new ConnectionClosedError(this.name, 'connection has been disconnected');
    }
    if (this.connecting) {
      return this.connecting;
    }

    if (this.currentState === 'degraded') {
      this.stopSupervisor();
      this.reconnectAttempts = 0;
    }

    try {
      await this.runAttempt();
    } catch (err) {
      if (this.currentState === 'degraded' && !(err instanceof SpawnError)) {
        this.startSupervisor();
      }
      throw err;
    }
  }

  /**
   * Send a request and wait for its correlated response
   *
   * @throws ServerUnavailableError unless ready
   * @throws PendingLimitError when too many requests are in flight
   * @throws RequestTimeoutError, RemoteError, WriteError, ConnectionClosedError or RequestCancelledError
   */
  call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    const transport = this.transport;
    if (this.currentState !== 'ready' || !transport) {
      return Promise.reject(new ServerUnavailableError(this.name, this.currentState));
    }
    if (this.pending.size >= this.options.maxPendingRequests) {
      return Promise.reject(new PendingLimitError(this.name, this.options.maxPendingRequests));
    }

    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(this.name, method));
    }

    const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs;
    const id = this.nextRequestId++;

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.settlePending(id)) {
          reject(new RequestCancelledError(this.name, method));
        }
      };

      const timeout = setTimeout(() => {
        if (this.settlePending(id)) {
          this.log.warn(`[connection] Request timed out after ${timeoutMs}ms: ${method}`);
          reject(new RequestTimeoutError(this.name, method, timeoutMs));
        }
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        method,
        resolve,
        reject,
        timeout,
        detach: () => signal?.removeEventListener('abort', onAbort),
      });
      this.touch();

      transport
        .send({ jsonrpc: JSONRPC_VERSION, id, method, params: params ?? {} })
        .catch((err: unknown) => {
          if (!this.settlePending(id)) {
            return;
          }
          const error = err instanceof WriteError ? err : new WriteError(this.name, String(err));
          this.consecutiveFailures++;
          reject(error);
          this.degrade('write_error', error.message);
        });
    });
  }

  /**
   * Fire-and-forget message with no id
   *
   * @throws ServerUnavailableError unless ready, WriteError if the write fails
   */
  async notify(method: string, params?: unknown): Promise<void> {
    const transport = this.transport;
    if (this.currentState !== 'ready' || !transport) {
      throw new ServerUnavailableError(this.name, this.currentState);
    }

    try {
      await transport.send({
        jsonrpc: JSONRPC_VERSION,
        method,
        ...(params !== undefined ? { params } : {}),
      });
      this.touch();
    } catch (err) {
      const error = err instanceof WriteError ? err : new WriteError(this.name, String(err));
      this.degrade('write_error', error.message);
      throw error;
    }
  }

  /**
   * Liveness check with the reserved ping method. Any response, including a
   * JSON-RPC error, proves the server is reading its input. A failed probe
   * counts as a failure.
   */
  async probe(timeoutMs: number): Promise<boolean> {
    try {
      await this.call(RESERVED_METHODS.PING, {}, { timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof RemoteError) {
        return true;
      }
      this.consecutiveFailures++;
      this.log.warn({ err }, '[connection] Probe failed');
      return false;
    }
  }

  /**
   * Take a ready connection out of service and start reconnecting
   */
  degrade(reason: string, detail = reason): void {
    if (this.currentState !== 'ready') {
      return;
    }

    const transport = this.transport;
    this.transport = null;
    this.failureReason = reason;
    this.connectedAt = null;
    this.errors.push(`${reason}: ${detail}`, 'error');
    this.log.warn(`[connection] Degraded (${reason}): ${detail}`);

    this.transition('degraded', reason);
    this.failAllPending(new ConnectionClosedError(this.name, detail));

    if (transport) {
      transport.close(this.options.shutdownGraceMs).catch((err: unknown) => {
        this.log.error({ err }, '[connection] Failed to stop process');
      });
    }

    this.startSupervisor();
  }

  /**
   * Close for good: fail pending requests, stop reconnecting and terminate the
   * process (SIGTERM, then SIGKILL after the grace period)
   */
  async disconnect(): Promise<void> {
    if (this.currentState === 'closed') {
      await this.closing;
      return;
    }

    this.log.info('[connection] Disconnecting');
    const reason = 'connection closed by client';
    const transport = this.transport;
    this.transport = null;

    this.transition('closed', reason);
    this.stopSupervisor();
    this.settleHandshake(new ConnectionClosedError(this.name, reason));
    this.failAllPending(new ConnectionClosedError(this.name, reason));

    this.closing = (async () => {
      if (transport) {
        await transport.close(this.options.shutdownGraceMs);
      }
      await this.supervisor;
      this.log.info('[connection] Stopped');
    })();
    await this.closing;
  }

  getHealthDetail(now = Date.now()): ConnectionHealthDetail {
    return {
      name: this.name,
      state: this.currentState,
      pid: this.transport?.pid ?? null,
      pendingRequests: this.pending.size,
      consecutiveFailures: this.consecutiveFailures,
      reconnectAttempts: this.reconnectAttempts,
      connectedAt: this.connectedAt === null ? null : new Date(this.connectedAt).toISOString(),
      lastActivityAt: this.lastActivity === null ? null : new Date(this.lastActivity).toISOString(),
      uptimeMs: this.connectedAt === null ? null : now - this.connectedAt,
      failureReason: this.failureReason,
      serverInfo: this.serverInfo,
      recentErrors: this.errors.getRecent(10),
    };
  }

  // ===== Session lifecycle =====

  /**
   * Start a session attempt that connect() callers can join
   */
  private runAttempt(): Promise<void> {
    const attempt: Promise<void> = this.attempt().finally(() => {
      if (this.connecting === attempt) {
        this.connecting = null;
      }
    });
    this.connecting = attempt;
    return attempt;
  }

  private async attempt(): Promise<void> {
    this.transition('initializing');
    this.decodeErrors = 0;

    let transport: StdioTransport | null = null;
    let pid: number | undefined;
    try {
      transport = this.openTransport();
      this.transport = transport;

      const ready = this.waitForHandshake();
      this.readLoop(transport).catch((err: unknown) => {
        this.log.error({ err }, '[connection] Read loop failed');
      });
      await ready;

      // The stream may have ended right behind the ready message
      if (this.transport !== transport) {
        throw new ConnectionClosedError(this.name, 'process exited during handshake');
      }
      pid = transport.pid;
    } catch (err) {
      const error =
        err instanceof SwitchboardError ? err : new SpawnError(this.name, err instanceof Error ? err.message : String(err));

      if (this.transport === transport) {
        this.transport = null;
      }
      if (transport) {
        await transport.close(this.options.shutdownGraceMs);
      }

      this.errors.push(error.message, 'error');
      this.log.error({ err: error }, '[connection] Failed to start session');
      if (this.currentState === 'initializing') {
        this.failureReason = error.code;
        this.transition('degraded', error.code);
      }
      throw error;
    }

    const now = Date.now();
    this.connectedAt = now;
    this.lastActivity = now;
    this.consecutiveFailures = 0;
    this.reconnectAttempts = 0;
    this.failureReason = null;
    this.transition('ready');
    this.log.info(`[connection] Ready (pid ${pid ?? 'unknown'})`);
  }

  private openTransport(): StdioTransport {
    const { command, args, env, cwd } = this.definition;
    this.log.info(`[connection] Spawning subprocess: ${command} ${args.join(' ')}`);
    if (Object.keys(env).length > 0) {
      this.log.info(`[connection] Environment variables injected: ${Object.keys(env).join(', ')}`);
    }

    let child: ChildHandle;
    try {
      child = this.options.spawn(command, args, {
        cwd: cwd ?? process.cwd(),
        env: buildChildEnv(this.options.baseEnv, env),
        stdio: ['pipe', 'pipe', 'pipe'],
      });
    } catch (err) {
      throw new SpawnError(this.name, err instanceof Error ? err.message : String(err), { command });
    }

    return new StdioTransport(child, {
      server: this.name,
      log: this.log,
      onStderr: line => this.errors.push(line, 'warn', 'stderr'),
      onExit: ({ code, signal }) =>
        this.errors.push(`process exited: code=${code} signal=${signal}`, 'info'),
      onProcessError: err => this.handleProcessError(child, err),
    });
  }

  private waitForHandshake(): Promise<void> {
    const timeoutMs = this.options.handshakeTimeoutMs;
    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.settleHandshake(new HandshakeTimeoutError(this.name, timeoutMs));
      }, timeoutMs);
      this.handshake = { resolve, reject, timeout };
    });
  }

  /**
   * Resolve (no error) or reject the pending handshake, if there is one
   */
  private settleHandshake(error?: Error): void {
    const waiter = this.handshake;
    if (!waiter) {
      return;
    }
    this.handshake = null;
    clearTimeout(waiter.timeout);
    if (error) {
      waiter.reject(error);
    } else {
      waiter.resolve();
    }
  }

  private handleProcessError(child: ChildHandle, err: Error): void {
    this.errors.push(`process error: ${err.message}`, 'error');
    if (this.currentState === 'initializing') {
      this.settleHandshake(
        child.pid === undefined
          ? new SpawnError(this.name, err.message, { command: this.definition.command })
          : new ConnectionClosedError(this.name, err.message)
      );
    }
  }

  // ===== Inbound =====

  private async readLoop(transport: StdioTransport): Promise<void> {
    for await (const frame of transport.receive()) {
      if (transport !== this.transport) {
        // Output of a process this connection has already let go of
        break;
      }
      this.touch();
      if (frame.ok) {
        this.decodeErrors = 0;
        this.handleMessage(frame.message);
      } else {
        this.handleDecodeError(frame.error);
      }
    }
    this.handleStreamEnd(transport);
  }

  private handleMessage(message: IncomingMessage): void {
    if ('method' in message) {
      this.handleNotification(message);
      return;
    }

    const { id } = message;
    const entry = typeof id === 'number' ? this.pending.get(id) : undefined;
    if (typeof id !== 'number' || !entry) {
      this.log.warn(`[connection] Dropping response with no waiting request (id=${String(id)})`);
      return;
    }

    this.settlePending(id);
    this.consecutiveFailures = 0;

    if ('error' in message) {
      const { code, message: text, data } = message.error;
      entry.reject(new RemoteError(this.name, code, text, data));
    } else {
      entry.resolve(message.result);
    }
  }

  private handleNotification(message: JsonRpcNotification): void {
    if (message.method !== RESERVED_METHODS.READY) {
      this.emit('notification', message);
      return;
    }

    if (message.id !== undefined && message.id !== READY_MESSAGE_ID) {
      this.log.warn(`[connection] Ignoring ready message with unexpected id ${String(message.id)}`);
      return;
    }

    if (this.currentState !== 'initializing' || !this.handshake) {
      this.log.debug('[connection] Ignoring duplicate ready message');
      return;
    }

    this.serverInfo = readServerInfo(message.params);
    this.settleHandshake();
  }

  private handleDecodeError(error: ProtocolError): void {
    this.decodeErrors++;
    this.consecutiveFailures++;
    this.errors.push(error.message, 'warn', 'protocol');
    this.log.warn({ line: error.line }, `[connection] ${error.message}`);

    if (this.currentState === 'ready' && this.decodeErrors >= this.options.maxConsecutiveDecodeErrors) {
      this.degrade('protocol_error', `${this.decodeErrors} undecodable messages in a row`);
    }
  }

  private handleStreamEnd(transport: StdioTransport): void {
    if (transport !== this.transport) {
      return;
    }

    if (this.currentState === 'initializing') {
      this.transport = null;
      this.settleHandshake(new ConnectionClosedError(this.name, 'process exited before ready'));
      return;
    }

    this.degrade('end_of_stream', 'server closed its output stream');
  }

  // ===== Pending requests =====

  /**
   * Remove a pending entry and its timer. False if it was already settled.
   */
  private settlePending(id: number): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      return false;
    }
    this.pending.delete(id);
    clearTimeout(entry.timeout);
    entry.detach();
    return true;
  }

  private failAllPending(error: Error): void {
    const entries = [...this.pending.values()];
    for (const entry of entries) {
      clearTimeout(entry.timeout);
      entry.detach();
    }
    this.pending.clear();
    for (const entry of entries) {
      entry.reject(error);
    }
  }

  // ===== Reconnect =====

  private startSupervisor(): void {
    if (this.supervisorAbort || this.currentState !== 'degraded') {
      return;
    }
    const controller = new AbortController();
    this.supervisorAbort = controller;
    this.supervisor = this.supervise(controller).catch((err: unknown) => {
      this.log.error({ err }, '[connection] Reconnect loop failed');
    });
  }

  private stopSupervisor(): void {
    this.supervisorAbort?.abort();
    this.supervisorAbort = null;
  }

  private async supervise(controller: AbortController): Promise<void> {
    const { reconnect } = this.options;
    try {
      while (this.reconnectAttempts < reconnect.maxAttempts) {
        const attempt = ++this.reconnectAttempts;
        const delayMs = computeBackoffDelay(attempt, reconnect, this.options.random);

        this.log.info(`[connection] Reconnect attempt ${attempt}/${reconnect.maxAttempts} in ${delayMs}ms`);
        this.emit('reconnect-scheduled', { attempt, delayMs });

        const elapsed = await sleep(delayMs, controller.signal);
        if (!elapsed || this.currentState !== 'degraded') {
          return;
        }

        try {
          await this.runAttempt();
          this.log.info(`[connection] Reconnected after ${attempt} attempt(s)`);
          return;
        } catch (err) {
          if (this.currentState !== 'degraded' || controller.signal.aborted) {
            return;
          }
          if (err instanceof SpawnError) {
            break;
          }
        }
      }

      this.log.error(`[connection] Giving up after ${this.reconnectAttempts} reconnect attempt(s)`);
      this.emit('reconnect-exhausted', { attempts: this.reconnectAttempts, reason: this.failureReason });
    } finally {
      if (this.supervisorAbort === controller) {
        this.supervisorAbort = null;
      }
    }
  }

  // ===== Helpers =====

  private transition(next: ConnectionState, reason?: string): void {
    const previous = this.currentState;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new SwitchboardError(
        `[${this.name}] Invalid state transition ${previous} -> ${next}`,
        'invalid_transition'
      );
    }
    this.currentState = next;
    this.log.debug(`[connection] ${previous} -> ${next}${reason ? ` (${reason})` : ''}`);
    this.emit('state', next, previous, reason);
  }

  private touch(): void {
    this.lastActivity = Date.now();
  }
}

function readServerInfo(params: unknown): unknown {
  if (typeof params === 'object' && params !== null && 'server' in params) {
    return params.server;
  }
  return null;
}
