/**
 * Request decoding shared by the HTTP and WebSocket surfaces.
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidRequestError } from './errors.js';
import type { ChatRequest } from './types.js';

/** Largest accepted request body or client message. */
export const MAX_BODY_BYTES = 10 * 1024 * 1024;

export const INVALID_JSON_MESSAGE = 'Invalid JSON message format received from client.';

export function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError(INVALID_JSON_MESSAGE);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a decoded body as a chat request. Unknown members are dropped.
 */
export function validateChatRequest(
  schema: ZodType<ChatRequest, ZodTypeDef, unknown>,
  data: unknown
): ChatRequest {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InvalidRequestError('Request body failed validation.', {
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      status: 422,
    });
  }
  return result.data;
}
