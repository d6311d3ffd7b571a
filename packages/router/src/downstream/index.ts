/**
 * Downstream connections - main exports
 */

export { ServerManager, DEFAULT_HEALTH_CHECK_POLICY } from './manager.js';
export { CommandRouter, aggregate, failure, toOutcome } from './command-router.js';
export { ToolCatalog } from './tool-catalog.js';
export { StdioConnection, DEFAULT_CONNECTION_OPTIONS } from './stdio-connection.js';
export { StdioTransport, SAFE_ENV_VARS, buildChildEnv, redactCredentials } from './stdio-transport.js';
export { ErrorRingBuffer } from './error-ring-buffer.js';
export { computeBackoffDelay, sleep } from './backoff.js';
export { connectionOptionsFromDefaults, healthCheckPolicyFromDefaults } from './types.js';
export type {
  ServerManagerOptions,
  ResolvedTarget,
  ConnectResult,
  HealthCheckReport,
  ManagerStatus,
} from './manager.js';
export type { DispatchOptions, CommandRouterOptions } from './command-router.js';
export type { CatalogTool, CatalogRefreshReport } from './tool-catalog.js';
export type { ConnectionHealthDetail } from './stdio-connection.js';
export type { TransportFrame, ExitInfo, StdioTransportOptions } from './stdio-transport.js';
export type { ErrorLogEntry, ErrorLogSource } from './error-ring-buffer.js';
export type {
  ChildHandle,
  SpawnFn,
  ReconnectPolicy,
  ConnectionOptions,
  HealthCheckPolicy,
  CallOptions,
  ReconnectScheduledEvent,
  ReconnectExhaustedEvent,
  ServerNotification,
} from './types.js';
