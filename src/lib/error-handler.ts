/**
 * Error Handling Utilities
 *
 * Shared JSON success / error responses for the Hono routes.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type * as z from 'zod';
import { QueueClosedError } from './bounded-queue';
import { logger } from './logger';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'SERVICE_UNAVAILABLE'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export interface ApiErrorBody {
  success: false;
  error: string;
  code: ErrorCode;
  timestamp: string;
}

function classifyError(error: unknown): { status: ContentfulStatusCode; code: ErrorCode } {
  if (error instanceof QueueClosedError) {
    return { status: 503, code: 'SERVICE_UNAVAILABLE' };
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || /timed? ?out/i.test(error.message))) {
    return { status: 504, code: 'TIMEOUT' };
  }
  return { status: 500, code: 'INTERNAL_ERROR' };
}

function errorBody(error: string, code: ErrorCode): ApiErrorBody {
  return { success: false, error, code, timestamp: new Date().toISOString() };
}

/**
 * Log the error with its context and answer with the matching status.
 */
export function handleApiError(c: Context, error: unknown, context?: string) {
  const { status, code } = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);

  logger.error({ err: error, code, path: c.req.path }, `[API] ${context ?? 'Request failed'}`);

  return c.json(errorBody(message, code), status);
}

export function handleValidationError(c: Context, message: string) {
  return c.json(errorBody(message, 'VALIDATION_ERROR'), 400);
}

export function handleNotFoundError(c: Context, resource: string) {
  return c.json(errorBody(`${resource} not found`, 'NOT_FOUND'), 404);
}

export function handleUnauthorizedError(c: Context) {
  return c.json(errorBody('Unauthorized', 'UNAUTHORIZED'), 401);
}

/** Write accepted; it is applied once the store drains its queue. */
export function jsonAccepted(c: Context, entries: number) {
  return c.json({ success: true, accepted: entries, timestamp: new Date().toISOString() }, 202);
}

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: Response };

/**
 * Parse and validate a JSON request body. Invalid JSON or a schema
 * violation yields a ready 400 response.
 */
export async function parseJsonBody<S extends z.ZodType>(c: Context, schema: S): Promise<ParsedBody<z.output<S>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { ok: false, response: handleValidationError(c, 'Request body is not valid JSON') };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return {
      ok: false,
      response: handleValidationError(c, `Invalid request body${where}: ${issue?.message ?? 'unknown error'}`),
    };
  }
  return { ok: true, data: parsed.data };
}
