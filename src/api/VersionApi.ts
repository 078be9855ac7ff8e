import { IDockerApiClient, IVersion } from '../interfaces';
import { ApiResult } from '../types';

export const INFO_ENDPOINT = '/info';

export class VersionApi implements IVersion {
  private client: IDockerApiClient;

  constructor(client: IDockerApiClient) {
    this.client = client;
  }

  /**
   * Get version info for the daemon, returned as the JSON text the engine sent
   */
  async getVersionInfo(): Promise<ApiResult<string>> {
    return this.client.callApi(INFO_ENDPOINT, 'GET');
  }
}
