export const FailureKinds = {
  WRITE_ERROR: 'write_error',
  CONNECTION_CLOSED: 'connection_closed',
  SERVER_UNAVAILABLE: 'server_unavailable',
  NO_TARGETS_AVAILABLE: 'no_targets_available',
  REMOTE_ERROR: 'remote_error',
  PENDING_LIMIT: 'pending_limit',
  UNKNOWN_TOOL: 'unknown_tool',
  CANCELLED: 'cancelled',
  INTERNAL_ERROR: 'internal_error',
} as const;

export type FailureKind = typeof FailureKinds[keyof typeof FailureKinds];
