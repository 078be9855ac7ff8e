import * as fs from 'fs';
import { z } from 'zod';
import { DEFAULT_SOCKET_PATH, DEFAULT_TIMEOUT } from '../transport/SocketTransport';
import { DockerClientConfig } from '../types';
import { formatIssues } from '../utils/json';

const UNIX_SCHEME = 'unix://';

export type ConfigOverrides = {
  config?: string;
  host?: string;
  apiVersion?: string;
  verbose?: boolean;
  logPath?: string;
};

const ConfigSchema = z.object({
  socketPath: z.string().min(1, 'socket path must not be empty'),
  apiVersion: z.string().regex(/^v\d+\.\d+$/, 'API version must look like v1.43').optional(),
  timeout: z.number().int().positive(),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    logPath: z.string().optional()
  })
});

const ConfigFileSchema = ConfigSchema.deepPartial().extend({
  host: z.string().optional()
});

/**
 * Create default configuration
 */
export function createDefaultConfig(): DockerClientConfig {
  return {
    socketPath: DEFAULT_SOCKET_PATH,
    timeout: DEFAULT_TIMEOUT,
    logging: {
      level: 'info'
    }
  };
}

/**
 * Turn a daemon address into a socket path.
 * Accepts unix:// URLs and absolute paths; other schemes are not supported.
 */
export function parseDockerHost(host: string): string {
  if (host.startsWith(UNIX_SCHEME)) {
    const socketPath = host.slice(UNIX_SCHEME.length);
    if (!socketPath.startsWith('/')) {
      throw new Error(`Invalid docker host: ${host}`);
    }
    return socketPath;
  }

  if (host.startsWith('/')) {
    return host;
  }

  throw new Error(`Unsupported docker host: ${host}. Only unix:// sockets are supported`);
}

/**
 * Load configuration from defaults, a config file, the environment and overrides, in that order
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): DockerClientConfig {
  const config = createDefaultConfig();

  if (overrides.config) {
    applyConfigFile(config, overrides.config);
  }

  const host = overrides.host || env.DOCKER_HOST;
  if (host) {
    config.socketPath = parseDockerHost(host);
  }

  if (overrides.apiVersion) {
    config.apiVersion = overrides.apiVersion;
  }
  if (overrides.verbose) {
    config.logging.level = 'debug';
  }
  if (overrides.logPath) {
    config.logging.logPath = overrides.logPath;
  }

  return validateConfig(config);
}

export function validateConfig(config: unknown): DockerClientConfig {
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function applyConfigFile(config: DockerClientConfig, filePath: string): void {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Configuration file not found: ${filePath}`);
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new Error(`Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = ConfigFileSchema.safeParse(content);
  if (!result.success) {
    throw new Error(`Invalid configuration file ${filePath}: ${formatIssues(result.error)}`);
  }

  const fileConfig = result.data;
  if (fileConfig.host) {
    config.socketPath = parseDockerHost(fileConfig.host);
  }
  if (fileConfig.socketPath) {
    config.socketPath = fileConfig.socketPath;
  }
  if (fileConfig.apiVersion) {
    config.apiVersion = fileConfig.apiVersion;
  }
  if (fileConfig.timeout !== undefined) {
    config.timeout = fileConfig.timeout;
  }
  if (fileConfig.logging?.level) {
    config.logging.level = fileConfig.logging.level;
  }
  if (fileConfig.logging?.logPath) {
    config.logging.logPath = fileConfig.logging.logPath;
  }
}
