/**
 * Core type definitions for the docksock client
 */

// Protocol Types
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'HEAD'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export interface EndpointDescriptor {
  path: string;
  method: HttpMethod;
  body?: string;
}

/**
 * A complete request, ready to be written to the transport in one go
 */
export type FormattedRequest = string;

export interface ParsedHttpResponse {
  statusCode: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface FormatOptions {
  apiVersion?: string;
}

// Error Types
export type ApiErrorType =
  | 'request_preparation'
  | 'no_response'
  | 'malformed_response'
  | 'decode_failure'
  | 'encode_failure';

export type FramingIssue =
  | 'empty'
  | 'missing_separator'
  | 'invalid_status_line'
  | 'invalid_header';

export interface ApiError {
  type: ApiErrorType;
  message: string;
  reason?: FramingIssue;
}

export type ApiResult<T> =
  | { success: true; data: T }
  | { success: false; error: ApiError };

// Configuration Types
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingOptions {
  level: LogLevel;
  logPath?: string;
}

export interface DockerClientConfig {
  socketPath: string;
  apiVersion?: string;
  timeout: number;
  logging: LoggingOptions;
}

// Resource Types
export type {
  Container,
  Port,
  HostConfig,
  Mount,
  ContainerConfig,
  CreateContainerResponse
} from '../schemas';

export interface ContainerListQuery {
  all?: boolean;
  size?: boolean;
  limit?: number;
  filter?: string;
}
