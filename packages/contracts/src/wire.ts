import { z } from 'zod';
import type { IncomingMessage } from '@switchboard/protocol';

const correlationIdSchema = z.union([z.number().int(), z.string()]);

export const errorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const errorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: correlationIdSchema.nullable(),
  error: errorObjectSchema,
});

// `result` may legitimately be null, so presence is checked separately
export const successResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: correlationIdSchema,
  result: z.unknown(),
});

export const notificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: z.unknown().optional(),
  id: correlationIdSchema.optional(),
});

export type ParsedIncoming =
  | { success: true; message: IncomingMessage }
  | { success: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a decoded JSON value as something a server may send
 *
 * Error responses are recognised by `error`, notifications by `method`,
 * success responses by `id` plus a present `result` key.
 */
export function parseIncomingMessage(value: unknown): ParsedIncoming {
  if (!isRecord(value)) {
    return { success: false, error: 'message is not a JSON object' };
  }

  if ('error' in value) {
    const parsed = errorResponseSchema.safeParse(value);
    if (!parsed.success) {
      return { success: false, error: `invalid error response: ${describeIssues(parsed.error)}` };
    }
    const { id, error } = parsed.data;
    const errorObject =
      error.data === undefined
        ? { code: error.code, message: error.message }
        : { code: error.code, message: error.message, data: error.data };
    return { success: true, message: { jsonrpc: '2.0', id, error: errorObject } };
  }

  if ('method' in value) {
    const parsed = notificationSchema.safeParse(value);
    if (!parsed.success) {
      return { success: false, error: `invalid notification: ${describeIssues(parsed.error)}` };
    }
    const { method, params, id } = parsed.data;
    return {
      success: true,
      message: {
        jsonrpc: '2.0',
        method,
        ...(params !== undefined ? { params } : {}),
        ...(id !== undefined ? { id } : {}),
      },
    };
  }

  if ('result' in value) {
    const parsed = successResponseSchema.safeParse(value);
    if (!parsed.success) {
      return { success: false, error: `invalid response: ${describeIssues(parsed.error)}` };
    }
    return {
      success: true,
      message: { jsonrpc: '2.0', id: parsed.data.id, result: value['result'] },
    };
  }

  return { success: false, error: 'message has neither result, error nor method' };
}
