import { ContainerConfig } from '../types';

/**
 * Fully specified container configuration with every optional field at its default
 */
export function defaultContainerConfig(): ContainerConfig {
  return {
    Image: '',
    Cmd: [],
    Hostname: '',
    Domainname: '',
    User: '',
    AttachStdin: false,
    AttachStdout: false,
    AttachStderr: false,
    Tty: false,
    OpenStdin: false,
    StdinOnce: false,
    Env: [],
    Entrypoint: '',
    Labels: null,
    WorkingDir: ''
  };
}

export function withContainerDefaults(overrides: Partial<ContainerConfig>): ContainerConfig {
  return { ...defaultContainerConfig(), ...overrides };
}

/**
 * Builder for container configurations.
 * Starts from the defaults and applies only what the caller sets.
 */
export class ContainerConfigBuilder {
  private config: ContainerConfig;

  constructor(image?: string) {
    this.config = defaultContainerConfig();
    if (image !== undefined) {
      this.config.Image = image;
    }
  }

  image(image: string): this {
    this.config.Image = image;
    return this;
  }

  cmd(cmd: string[]): this {
    this.config.Cmd = [...cmd];
    return this;
  }

  entrypoint(entrypoint: string): this {
    this.config.Entrypoint = entrypoint;
    return this;
  }

  hostname(hostname: string, domainname: string = ''): this {
    this.config.Hostname = hostname;
    this.config.Domainname = domainname;
    return this;
  }

  user(user: string): this {
    this.config.User = user;
    return this;
  }

  workingDir(dir: string): this {
    this.config.WorkingDir = dir;
    return this;
  }

  /**
   * Add an environment variable in KEY=VALUE form
   */
  env(key: string, value: string): this {
    this.config.Env = [...this.config.Env, `${key}=${value}`];
    return this;
  }

  label(key: string, value: string): this {
    this.config.Labels = { ...(this.config.Labels ?? {}), [key]: value };
    return this;
  }

  /**
   * Attach stdio streams and allocate a TTY for interactive use
   */
  interactive(tty: boolean = true): this {
    this.config.AttachStdin = true;
    this.config.AttachStdout = true;
    this.config.AttachStderr = true;
    this.config.OpenStdin = true;
    this.config.StdinOnce = true;
    this.config.Tty = tty;
    return this;
  }

  build(): ContainerConfig {
    return {
      ...this.config,
      Cmd: [...this.config.Cmd],
      Env: [...this.config.Env],
      Labels: this.config.Labels ? { ...this.config.Labels } : null
    };
  }
}
