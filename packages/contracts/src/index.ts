// Inbound wire message validation
export {
  errorObjectSchema,
  errorResponseSchema,
  successResponseSchema,
  notificationSchema,
  parseIncomingMessage,
  type ParsedIncoming,
} from './wire.js';

// Aggregated result envelope
export {
  NO_TARGETS_KEY,
  deriveStatus,
  successfulServers,
  failedServers,
  type SuccessOutcome,
  type FailureOutcome,
  type TimedOutOutcome,
  type ServerOutcome,
  type OverallStatus,
  type AggregatedResult,
} from './envelope.js';

// Failure kinds reported per server
export { FailureKinds, type FailureKind } from './failure-kinds.js';
