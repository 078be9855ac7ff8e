import * as net from 'net';
import winston from 'winston';
import { ITransport } from '../interfaces';
import { FormattedRequest } from '../types';
import { describeError } from '../utils/errors';
import { getDefaultLogger } from '../utils/logger';
import { removeChunkedFraming } from './ChunkedDecoder';

export const DEFAULT_SOCKET_PATH = '/var/run/docker.sock';
export const DEFAULT_TIMEOUT = 30000;

export interface SocketTransportOptions {
  timeout?: number;
  logger?: winston.Logger;
}

/**
 * Transport over the daemon's Unix domain socket.
 * Opens one connection per request and reads until the daemon closes it.
 * Chunked bodies are decoded before the response is handed back; a chunk
 * stream that cannot be decoded is returned as received.
 */
export class SocketTransport implements ITransport {
  private socketPath: string;
  private timeout: number;
  private logger: winston.Logger;

  constructor(socketPath: string = DEFAULT_SOCKET_PATH, options: SocketTransportOptions = {}) {
    this.socketPath = socketPath;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.logger = options.logger ?? getDefaultLogger();
  }

  send(request: FormattedRequest): Promise<string | undefined> {
    return new Promise(resolve => {
      const chunks: Buffer[] = [];
      let settled = false;

      const socket = net.createConnection({ path: this.socketPath });

      const finish = (response?: string): void => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(response && response.length > 0 ? response : undefined);
      };

      socket.setTimeout(this.timeout);

      socket.on('connect', () => {
        socket.write(request);
      });

      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.on('end', () => {
        finish(this.decodeResponse(Buffer.concat(chunks)));
      });

      socket.on('timeout', () => {
        this.logger.warn(`Timed out after ${this.timeout}ms waiting for ${this.socketPath}`);
        finish();
      });

      socket.on('error', (error: Error) => {
        this.logger.warn(`Socket error on ${this.socketPath}: ${error.message}`);
        finish();
      });
    });
  }

  private decodeResponse(raw: Buffer): string {
    try {
      return removeChunkedFraming(raw).toString('utf8');
    } catch (error) {
      this.logger.warn(`Malformed chunked response from ${this.socketPath}: ${describeError(error)}`);
      return raw.toString('utf8');
    }
  }

  getSocketPath(): string {
    return this.socketPath;
  }
}
