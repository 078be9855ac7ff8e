import { z } from 'zod';
import { ApiResult } from '../types';
import { describeError, fail, ok } from './errors';

/**
 * Render validation issues as "path: message" pairs
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Parse a response body and check it against a schema.
 * Both parse and schema errors surface as decode_failure with their diagnostic.
 */
export function decodeJson<S extends z.ZodTypeAny>(body: string, schema: S): ApiResult<z.output<S>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return fail('decode_failure', describeError(error));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return fail('decode_failure', formatIssues(result.error));
  }

  return ok(result.data);
}

/**
 * Validate a value against a schema and serialize it to JSON
 */
export function encodeJson<S extends z.ZodTypeAny>(value: z.input<S>, schema: S): ApiResult<string> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return fail('encode_failure', formatIssues(result.error));
  }

  try {
    return ok(JSON.stringify(result.data));
  } catch (error) {
    return fail('encode_failure', describeError(error));
  }
}
