import type { FailureKind } from './failure-kinds.js';

// Per-server outcome of one dispatched command
export type SuccessOutcome = { status: 'success'; payload: unknown; durationMs: number };
export type FailureOutcome = {
  status: 'failure';
  kind: FailureKind;
  message: string;
  code?: number;
  details?: Record<string, unknown>;
  durationMs: number;
};
export type TimedOutOutcome = { status: 'timed_out'; timeoutMs: number; durationMs: number };
export type ServerOutcome = SuccessOutcome | FailureOutcome | TimedOutOutcome;

export type OverallStatus = 'all_succeeded' | 'partial_success' | 'all_failed';

// Key used for the synthetic entry when a target resolves to nothing
export const NO_TARGETS_KEY = '*';

export type AggregatedResult = {
  method: string;
  target: string;
  status: OverallStatus;
  outcomes: Record<string, ServerOutcome>;
  startedAt: string;
  durationMs: number;
};

/**
 * Advisory overall status: all_succeeded iff every entry succeeded,
 * all_failed iff none did (or there are no entries).
 */
export function deriveStatus(outcomes: Record<string, ServerOutcome>): OverallStatus {
  const entries = Object.values(outcomes);
  const succeeded = entries.filter(outcome => outcome.status === 'success').length;

  if (entries.length > 0 && succeeded === entries.length) {
    return 'all_succeeded';
  }
  if (succeeded === 0) {
    return 'all_failed';
  }
  return 'partial_success';
}

export function successfulServers(result: AggregatedResult): string[] {
  return Object.entries(result.outcomes)
    .filter(([, outcome]) => outcome.status === 'success')
    .map(([server]) => server)
    .sort();
}

export function failedServers(result: AggregatedResult): string[] {
  return Object.entries(result.outcomes)
    .filter(([, outcome]) => outcome.status !== 'success')
    .map(([server]) => server)
    .sort();
}
