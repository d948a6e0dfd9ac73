import type { z } from 'zod';
import { ErrorResponseSchema } from '../schemas';
import { HmrcResponseParsingError } from '../errors';
import { HmrcErrorResponse } from '../types';
import { tryCatch } from '../tryCatch';

/**
 * Parses JSON bodies returned by the HMRC APIs
 *
 * Success bodies are checked against the documented shape so callers
 * receive typed values; unknown extra fields are dropped.
 */

/**
 * Check a decoded body against a schema
 *
 * @param schema Expected shape
 * @param body Decoded JSON body
 * @param context What was being fetched, used in the error message
 * @throws {HmrcResponseParsingError} If the body does not match
 */
export function parseJsonResponse<T>(schema: z.ZodType<T>, body: unknown, context: string): T {
  const result = schema.safeParse(body);

  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new HmrcResponseParsingError(
      `Unexpected ${context} response${where}: ${issue?.message ?? 'invalid body'}`,
      body
    );
  }

  return result.data;
}

/**
 * Try to read an HMRC error envelope from a raw response body
 *
 * @returns The envelope, or null when the body is not one
 */
export function parseErrorResponse(text: string): HmrcErrorResponse | null {
  if (!text?.trim()) {
    return null;
  }

  const { data: json, error } = tryCatch((): unknown => JSON.parse(text));
  if (error !== null) {
    return null;
  }

  const result = ErrorResponseSchema.safeParse(json);
  return result.success ? result.data : null;
}
