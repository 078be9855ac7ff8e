import { ApiResult, Container, ContainerConfig, CreateContainerResponse } from '../types';

/**
 * Container operations of the Docker engine API
 */
export interface IContainers {
  /**
   * List running containers, with their sizes
   */
  listRunningContainers(limit?: number): Promise<ApiResult<Container[]>>;

  /**
   * List all containers whether running or stopped
   */
  listAllContainers(limit?: number): Promise<ApiResult<Container[]>>;

  /**
   * List all containers matching the filter expression
   */
  listContainersWithFilter(filter: string, limit?: number): Promise<ApiResult<Container[]>>;

  /**
   * Create a container with the given name from a full configuration
   */
  createContainer(name: string, config: ContainerConfig): Promise<ApiResult<CreateContainerResponse>>;

  /**
   * Create a container from an image and command, everything else defaulted
   */
  createContainerMinimal(name: string, image: string, cmd: string[]): Promise<ApiResult<CreateContainerResponse>>;
}
