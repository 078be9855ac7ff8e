export * from './types';
export * from './interfaces';
export {
  ContainerSchema,
  ContainerListSchema,
  ContainerConfigSchema,
  CreateContainerResponseSchema,
  PortSchema,
  HostConfigSchema,
  MountSchema
} from './schemas';
export { formatApiRequest, isHttpMethod } from './protocol/RequestFormatter';
export { parseHttpResponse, extractResponseBody, HEADER_SEPARATOR } from './protocol/ResponseParser';
export { SocketTransport, SocketTransportOptions, DEFAULT_SOCKET_PATH, DEFAULT_TIMEOUT } from './transport/SocketTransport';
export { decodeChunkedBody, removeChunkedFraming } from './transport/ChunkedDecoder';
export { DockerClient, DockerClientOptions } from './clients/DockerClient';
export { ContainersApi } from './api/ContainersApi';
export { VersionApi, INFO_ENDPOINT } from './api/VersionApi';
export { buildContainerListQuery, buildCreateContainerPath } from './utils/QueryBuilder';
export { ContainerConfigBuilder, defaultContainerConfig, withContainerDefaults } from './utils/ContainerConfigBuilder';
export { DockerApiError, createApiError, unwrapResult } from './utils/errors';
export { decodeJson, encodeJson } from './utils/json';
export { createLogger, getDefaultLogger } from './utils/logger';
export { loadConfig, createDefaultConfig, parseDockerHost, ConfigOverrides } from './config';
