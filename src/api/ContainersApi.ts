import { IContainers, IDockerApiClient } from '../interfaces';
import { ContainerConfigSchema, ContainerListSchema, CreateContainerResponseSchema } from '../schemas';
import { ApiResult, Container, ContainerConfig, ContainerListQuery, CreateContainerResponse } from '../types';
import { withContainerDefaults } from '../utils/ContainerConfigBuilder';
import { fail } from '../utils/errors';
import { decodeJson, encodeJson } from '../utils/json';
import { buildContainerListQuery, buildCreateContainerPath, CONTAINERS_LIST_ENDPOINT } from '../utils/QueryBuilder';

/**
 * Container operations, expressed only through the uniform call contract
 */
export class ContainersApi implements IContainers {
  private client: IDockerApiClient;

  constructor(client: IDockerApiClient) {
    this.client = client;
  }

  async listRunningContainers(limit?: number): Promise<ApiResult<Container[]>> {
    return this.getContainers({ size: true, limit });
  }

  async listAllContainers(limit?: number): Promise<ApiResult<Container[]>> {
    return this.getContainers({ all: true, size: true, limit });
  }

  /**
   * The filter syntax is the engine's own, see the ContainerList operation
   * in the Docker engine API reference
   */
  async listContainersWithFilter(filter: string, limit?: number): Promise<ApiResult<Container[]>> {
    return this.getContainers({ all: true, size: true, limit, filter });
  }

  async createContainer(name: string, config: ContainerConfig): Promise<ApiResult<CreateContainerResponse>> {
    const body = encodeJson(config, ContainerConfigSchema);
    if (!body.success) {
      return body;
    }

    const response = await this.client.callApi(buildCreateContainerPath(name), 'POST', body.data);
    if (!response.success) {
      return response;
    }

    return decodeJson(response.data, CreateContainerResponseSchema);
  }

  async createContainerMinimal(name: string, image: string, cmd: string[]): Promise<ApiResult<CreateContainerResponse>> {
    return this.createContainer(name, withContainerDefaults({ Image: image, Cmd: cmd }));
  }

  /**
   * Fetch and decode a container listing
   */
  private async getContainers(query: ContainerListQuery): Promise<ApiResult<Container[]>> {
    if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 0)) {
      return fail('request_preparation', `limit must be a non-negative integer, got ${query.limit}`);
    }

    const path = CONTAINERS_LIST_ENDPOINT + buildContainerListQuery(query);
    const response = await this.client.callApi(path, 'GET');
    if (!response.success) {
      return response;
    }

    return decodeJson(response.data, ContainerListSchema);
  }
}
