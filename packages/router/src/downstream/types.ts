/**
 * Downstream connection types
 *
 * Process handle, spawn contract and tuning knobs shared by the transport,
 * connection and manager.
 */

import type { SpawnOptions } from 'child_process';
import type { Readable, Writable } from 'stream';
import type { ConnectionDefaults } from '@switchboard/core';
import type { JsonRpcNotification } from '@switchboard/protocol';

/**
 * The slice of a ChildProcess the transport relies on. Real processes come from
 * child_process.spawn; tests pass in-process fakes.
 */
export interface ChildHandle {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

/**
 * Exponential backoff between reconnect attempts
 */
export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables automatic reconnects */
  maxAttempts: number;
  /** Upward jitter as a fraction of the delay, below 1 */
  jitterRatio: number;
}

export interface ConnectionOptions {
  handshakeTimeoutMs: number;
  /** Default per-request timeout when a call does not pass one */
  requestTimeoutMs: number;
  /** Time between SIGTERM and SIGKILL on shutdown */
  shutdownGraceMs: number;
  maxPendingRequests: number;
  /** Decode failures in a row that degrade a ready connection */
  maxConsecutiveDecodeErrors: number;
  reconnect: ReconnectPolicy;
  spawn: SpawnFn;
  /** Source of jitter, in [0, 1) */
  random: () => number;
  /** Environment the safe whitelist is read from */
  baseEnv: NodeJS.ProcessEnv;
}

export interface HealthCheckPolicy {
  /** 0 disables periodic checks */
  intervalMs: number;
  /** Ready connections idle this long get a ping probe */
  idleThresholdMs: number;
  /** Consecutive request failures that degrade a connection */
  failureThreshold: number;
  probeTimeoutMs: number;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Connection event payloads
 */
export interface ReconnectScheduledEvent {
  attempt: number;
  delayMs: number;
}

export interface ReconnectExhaustedEvent {
  attempts: number;
  reason: string | null;
}

export type ServerNotification = JsonRpcNotification;

/**
 * Map config-file tuning (snake_case) onto connection options
 */
export function connectionOptionsFromDefaults(defaults: ConnectionDefaults): Partial<ConnectionOptions> {
  return {
    handshakeTimeoutMs: defaults.handshake_timeout_ms,
    requestTimeoutMs: defaults.request_timeout_ms,
    shutdownGraceMs: defaults.shutdown_grace_ms,
    maxPendingRequests: defaults.max_pending_requests,
    maxConsecutiveDecodeErrors: defaults.max_consecutive_decode_errors,
    reconnect: {
      baseDelayMs: defaults.reconnect.base_delay_ms,
      maxDelayMs: defaults.reconnect.max_delay_ms,
      maxAttempts: defaults.reconnect.max_attempts,
      jitterRatio: defaults.reconnect.jitter_ratio,
    },
  };
}

export function healthCheckPolicyFromDefaults(defaults: ConnectionDefaults): HealthCheckPolicy {
  return {
    intervalMs: defaults.health_check.interval_ms,
    idleThresholdMs: defaults.health_check.idle_threshold_ms,
    failureThreshold: defaults.health_check.failure_threshold,
    probeTimeoutMs: defaults.health_check.probe_timeout_ms,
  };
}
