/**
 * Custom error classes
 *
 * All switchboard errors extend SwitchboardError so callers can map them to a
 * failure kind by `code`.
 */

export class SwitchboardError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SwitchboardError';
  }
}

/**
 * Malformed or inconsistent server definitions. Aborts startup.
 */
export class ConfigurationError extends SwitchboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'configuration_error', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The server process could not be launched
 */
export class SpawnError extends SwitchboardError {
  constructor(
    public server: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(`[${server}] Failed to spawn process: ${message}`, 'spawn_error', details);
    this.name = 'SpawnError';
  }
}

export class HandshakeTimeoutError extends SwitchboardError {
  constructor(
    public server: string,
    public timeoutMs: number
  ) {
    super(`[${server}] No ready message within ${timeoutMs}ms`, 'handshake_timeout', { timeoutMs });
    this.name = 'HandshakeTimeoutError';
  }
}

export class WriteError extends SwitchboardError {
  constructor(
    public server: string,
    message: string
  ) {
    super(`[${server}] Write failed: ${message}`, 'write_error');
    this.name = 'WriteError';
  }
}

/**
 * A line from the server that could not be decoded. Reported per message; the
 * stream keeps going.
 */
export class ProtocolError extends SwitchboardError {
  constructor(
    public server: string,
    message: string,
    public line?: string
  ) {
    super(`[${server}] Protocol error: ${message}`, 'protocol_error');
    this.name = 'ProtocolError';
  }
}

export class RequestTimeoutError extends SwitchboardError {
  constructor(
    public server: string,
    public method: string,
    public timeoutMs: number
  ) {
    super(`[${server}] Request timed out after ${timeoutMs}ms: ${method}`, 'timed_out', {
      method,
      timeoutMs,
    });
    this.name = 'RequestTimeoutError';
  }
}

export class ConnectionClosedError extends SwitchboardError {
  constructor(
    public server: string,
    reason: string
  ) {
    super(`[${server}] Connection closed: ${reason}`, 'connection_closed', { reason });
    this.name = 'ConnectionClosedError';
  }
}

export class ServerUnavailableError extends SwitchboardError {
  constructor(
    public server: string,
    state?: string
  ) {
    super(
      state ? `Server '${server}' is unavailable (state: ${state})` : `Server '${server}' is unavailable`,
      'server_unavailable',
      state ? { state } : undefined
    );
    this.name = 'ServerUnavailableError';
  }
}

/**
 * The server answered with a JSON-RPC error object
 */
export class RemoteError extends SwitchboardError {
  constructor(
    public server: string,
    public remoteCode: number,
    message: string,
    public data?: unknown
  ) {
    super(message, 'remote_error', { remoteCode });
    this.name = 'RemoteError';
  }
}

export class PendingLimitError extends SwitchboardError {
  constructor(
    public server: string,
    public limit: number
  ) {
    super(
      `[${server}] Too many pending requests (${limit}), server may be unresponsive`,
      'pending_limit',
      { limit }
    );
    this.name = 'PendingLimitError';
  }
}

/**
 * The caller aborted the request
 */
export class RequestCancelledError extends SwitchboardError {
  constructor(
    public server: string,
    public method: string
  ) {
    super(`[${server}] Request cancelled: ${method}`, 'cancelled', { method });
    this.name = 'RequestCancelledError';
  }
}
