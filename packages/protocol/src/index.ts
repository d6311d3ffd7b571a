/**
 * @switchboard/protocol
 *
 * Type-only package defining the wire contract between the switchboard and the
 * tool servers it spawns, plus the vocabulary callers use to address them.
 * Zero runtime dependencies beyond a handful of constants.
 */

/**
 * JSON-RPC version tag carried by every message
 */
export const JSONRPC_VERSION = '2.0';

/**
 * Reserved method names
 *
 * `ready` is the unsolicited notification a server sends once it accepts calls.
 * `ping` is the liveness probe used by health checks.
 */
export const RESERVED_METHODS = {
  READY: 'ready',
  PING: 'ping',
} as const;

/**
 * Id some servers attach to their ready notification
 */
export const READY_MESSAGE_ID = 'init';

/**
 * Correlation id. The switchboard only ever allocates numbers; servers may echo
 * strings in notifications.
 */
export type CorrelationId = number | string;

/**
 * Outgoing request
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: unknown;
}

/**
 * Outgoing or incoming notification (no id, or the ready id)
 */
export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
  id?: CorrelationId;
}

/**
 * Structured error carried by an error response
 */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: CorrelationId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: CorrelationId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * Anything a server may write to stdout
 */
export type IncomingMessage = JsonRpcResponse | JsonRpcNotification;

/**
 * Anything the switchboard writes to stdin
 */
export type OutgoingMessage = JsonRpcRequest | JsonRpcNotification;

/**
 * Standard JSON-RPC error codes
 */
export const JSON_RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/**
 * Per-server connection state
 *
 * disconnected → initializing → ready → degraded → closed
 */
export type ConnectionState = 'disconnected' | 'initializing' | 'ready' | 'degraded' | 'closed';

/**
 * Where a command goes
 */
export type CommandTarget =
  | { kind: 'single'; server: string }
  | { kind: 'group'; group: string }
  | { kind: 'broadcast' };

/**
 * A logical command: one method and its parameters
 */
export interface Command {
  method: string;
  params?: unknown;
}

/**
 * Human-readable label for a target (used in logs and results)
 */
export function describeTarget(target: CommandTarget): string {
  switch (target.kind) {
    case 'single':
      return `server:${target.server}`;
    case 'group':
      return `group:${target.group}`;
    case 'broadcast':
      return 'broadcast';
  }
}
