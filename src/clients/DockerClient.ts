import winston from 'winston';
import { ContainersApi } from '../api/ContainersApi';
import { VersionApi } from '../api/VersionApi';
import { IContainers, IDockerApiClient, ITransport, IVersion } from '../interfaces';
import { formatApiRequest } from '../protocol/RequestFormatter';
import { extractResponseBody } from '../protocol/ResponseParser';
import { SocketTransport } from '../transport/SocketTransport';
import { ApiResult, DockerClientConfig, HttpMethod } from '../types';
import { describeError, fail } from '../utils/errors';
import { createLogger, getDefaultLogger } from '../utils/logger';

export interface DockerClientOptions {
  apiVersion?: string;
  logger?: winston.Logger;
}

/**
 * Docker API client implementation
 */
export class DockerClient implements IDockerApiClient {
  readonly containers: IContainers;
  readonly version: IVersion;

  private transport: ITransport;
  private apiVersion?: string;
  private logger: winston.Logger;

  constructor(transport: ITransport, options: DockerClientOptions = {}) {
    this.transport = transport;
    this.apiVersion = options.apiVersion;
    this.logger = options.logger ?? getDefaultLogger();
    this.containers = new ContainersApi(this);
    this.version = new VersionApi(this);
  }

  /**
   * Create a client talking to the socket named in the configuration
   */
  static fromConfig(config: DockerClientConfig, logger?: winston.Logger): DockerClient {
    const clientLogger = logger ?? createLogger(config.logging);
    const transport = new SocketTransport(config.socketPath, {
      timeout: config.timeout,
      logger: clientLogger
    });

    return new DockerClient(transport, {
      apiVersion: config.apiVersion,
      logger: clientLogger
    });
  }

  /**
   * Format the request, hand it to the transport and extract the body
   */
  async callApi(path: string, method: HttpMethod, body: string = ''): Promise<ApiResult<string>> {
    const request = formatApiRequest({ path, method, body }, { apiVersion: this.apiVersion });
    if (!request.success) {
      this.logger.debug(request.error.message, { path, method });
      return request;
    }

    this.logger.debug(`${method} ${path}`, { bodyLength: body.length });

    let raw: string | undefined;
    try {
      raw = await this.transport.send(request.data);
    } catch (error) {
      const failure = fail<string>('no_response', describeError(error));
      this.logFailure(failure, path, method);
      return failure;
    }

    if (raw === undefined || raw.length === 0) {
      const failure = fail<string>('no_response');
      this.logFailure(failure, path, method);
      return failure;
    }

    const result = extractResponseBody(raw);
    this.logFailure(result, path, method);
    return result;
  }

  // Callers report failures themselves
  private logFailure(result: ApiResult<string>, path: string, method: HttpMethod): void {
    if (!result.success) {
      this.logger.debug(result.error.message, { path, method, type: result.error.type });
    }
  }
}
