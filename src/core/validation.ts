/**
 * Validation utilities for safe JSON parsing with Zod schemas
 */

import { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Outcome of a call across a collaborator boundary.
 * Failures carry a message instead of throwing.
 */
export type Result<T> = { success: true; data: T } | { success: false; error: string };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T = never>(error: string): Result<T> {
  return { success: false, error };
}

/**
 * Safe JSON parse with Zod validation
 */
export function safeParseJson<T>(
  json: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Result<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return fail(error instanceof Error ? error.message : 'Invalid JSON');
  }

  const result = schema.safeParse(parsed);
  if (result.success) {
    return ok(result.data);
  }
  return fail(formatZodError(result.error));
}

/**
 * Format Zod error for logging
 */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

/**
 * Strip a markdown code fence around a model response, if present.
 * Only the first fenced block is considered.
 */
export function extractJsonText(output: string): string {
  const fenced = output.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    return fenced[1].trim();
  }
  return output.trim();
}
