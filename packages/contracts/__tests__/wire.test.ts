/**
 * Wire message validation and result envelope tests
 */

import { describe, it, expect } from 'vitest';
import {
  deriveStatus,
  failedServers,
  parseIncomingMessage,
  successfulServers,
  type AggregatedResult,
  type ServerOutcome,
} from '../src/index.js';

describe('parseIncomingMessage', () => {
  it('accepts success responses, including a null result', () => {
    expect(parseIncomingMessage({ jsonrpc: '2.0', id: 1, result: null })).toEqual({
      success: true,
      message: { jsonrpc: '2.0', id: 1, result: null },
    });
  });

  it('accepts error responses and keeps error data', () => {
    expect(
      parseIncomingMessage({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error', data: { at: 3 } },
      })
    ).toEqual({
      success: true,
      message: { jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error', data: { at: 3 } } },
    });
  });

  it('accepts notifications with or without an id', () => {
    expect(parseIncomingMessage({ jsonrpc: '2.0', method: 'progress' })).toEqual({
      success: true,
      message: { jsonrpc: '2.0', method: 'progress' },
    });
    expect(
      parseIncomingMessage({ jsonrpc: '2.0', method: 'ready', id: 'init', params: { server: 'files' } })
    ).toEqual({
      success: true,
      message: { jsonrpc: '2.0', method: 'ready', id: 'init', params: { server: 'files' } },
    });
  });

  it('rejects values that are not messages', () => {
    expect(parseIncomingMessage([1, 2])).toEqual({ success: false, error: 'message is not a JSON object' });
    expect(parseIncomingMessage('ready')).toEqual({ success: false, error: 'message is not a JSON object' });
    expect(parseIncomingMessage({ jsonrpc: '2.0', id: 1 })).toEqual({
      success: false,
      error: 'message has neither result, error nor method',
    });
  });

  it('rejects malformed envelopes', () => {
    const wrongVersion = parseIncomingMessage({ jsonrpc: '1.0', method: 'progress' });
    const badError = parseIncomingMessage({ jsonrpc: '2.0', id: 1, error: 'boom' });

    expect(wrongVersion.success).toBe(false);
    expect(!wrongVersion.success && wrongVersion.error).toMatch(/^invalid notification: jsonrpc/);
    expect(!badError.success && badError.error).toMatch(/^invalid error response: error/);
  });
});

describe('deriveStatus', () => {
  const ok: ServerOutcome = { status: 'success', payload: 1, durationMs: 2 };
  const timedOut: ServerOutcome = { status: 'timed_out', timeoutMs: 10, durationMs: 10 };

  it('derives the overall status from the outcomes', () => {
    expect(deriveStatus({ a: ok, b: ok })).toBe('all_succeeded');
    expect(deriveStatus({ a: ok, b: timedOut })).toBe('partial_success');
    expect(deriveStatus({ a: timedOut })).toBe('all_failed');
    expect(deriveStatus({})).toBe('all_failed');
  });

  it('lists successful and failed servers in name order', () => {
    const result: AggregatedResult = {
      method: 'search',
      target: 'broadcast',
      status: 'partial_success',
      outcomes: { c: ok, b: timedOut, a: ok },
      startedAt: '2026-01-01T00:00:00.000Z',
      durationMs: 12,
    };

    expect(successfulServers(result)).toEqual(['a', 'c']);
    expect(failedServers(result)).toEqual(['b']);
  });
});
