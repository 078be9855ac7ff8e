import { ApiResult, HttpMethod } from '../types';

/**
 * Uniform call contract every resource operation is built on
 */
export interface IDockerApiClient {
  /**
   * Format the request, send it and extract the response body.
   * Fails with request_preparation, no_response or malformed_response.
   */
  callApi(path: string, method: HttpMethod, body?: string): Promise<ApiResult<string>>;
}
