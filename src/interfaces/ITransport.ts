import { FormattedRequest } from '../types';

/**
 * Interface for the connection that carries requests to the daemon
 */
export interface ITransport {
  /**
   * Send a complete request and resolve with the raw response,
   * or undefined when no response was obtained
   */
  send(request: FormattedRequest): Promise<string | undefined>;
}
