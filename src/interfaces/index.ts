export * from './ITransport';
export * from './IDockerApiClient';
export * from './IContainers';
export * from './IVersion';
