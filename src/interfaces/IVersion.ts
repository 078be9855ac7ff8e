import { ApiResult } from '../types';

/**
 * Daemon version and system information
 */
export interface IVersion {
  /**
   * Raw JSON describing the daemon, as returned by the engine
   */
  getVersionInfo(): Promise<ApiResult<string>>;
}
