import { ApiError, ApiErrorType, ApiResult, FramingIssue } from '../types';

const ERROR_PREFIXES: Record<ApiErrorType, string> = {
  request_preparation: 'Error while preparing request',
  no_response: 'Got no response from docker host',
  malformed_response: 'Response body was not valid',
  decode_failure: 'Error while deserializing JSON response',
  encode_failure: 'Error while serializing container config'
};

/**
 * Create a standardized error object
 */
export function createApiError(type: ApiErrorType, detail?: string, reason?: FramingIssue): ApiError {
  const prefix = ERROR_PREFIXES[type];
  const error: ApiError = {
    type,
    message: detail ? `${prefix}: ${detail}` : prefix
  };

  if (reason) {
    error.reason = reason;
  }

  return error;
}

export function ok<T>(data: T): ApiResult<T> {
  return { success: true, data };
}

export function fail<T>(type: ApiErrorType, detail?: string, reason?: FramingIssue): ApiResult<T> {
  return { success: false, error: createApiError(type, detail, reason) };
}

/**
 * Error thrown by callers that prefer exceptions over result values
 */
export class DockerApiError extends Error {
  readonly type: ApiErrorType;
  readonly reason?: FramingIssue;

  constructor(error: ApiError) {
    super(error.message);
    this.name = 'DockerApiError';
    this.type = error.type;
    this.reason = error.reason;
  }
}

/**
 * Return the data of a successful result, or throw a DockerApiError
 */
export function unwrapResult<T>(result: ApiResult<T>): T {
  if (!result.success) {
    throw new DockerApiError(result.error);
  }
  return result.data;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
