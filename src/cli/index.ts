#!/usr/bin/env node

import { Command } from 'commander';
import { DockerClient } from '../clients/DockerClient';
import { ConfigOverrides, loadConfig } from '../config';
import { Container } from '../types';
import { ContainerConfigBuilder } from '../utils/ContainerConfigBuilder';
import { describeError, unwrapResult } from '../utils/errors';

interface PsOptions {
  all?: boolean;
  limit?: string;
  filter?: string;
}

interface CreateOptions {
  env: string[];
  label: string[];
  workdir?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * CLI interface for the docksock client
 */
class DocksockCLI {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('docksock')
      .description('Talk to the Docker engine over its Unix socket')
      .version('1.0.0')
      .option('-H, --host <host>', 'Daemon socket (unix:///path or /path)')
      .option('--api-version <version>', 'Engine API version prefix, e.g. v1.43')
      .option('-c, --config <path>', 'Path to configuration file')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--log-path <path>', 'Directory for log files');

    this.program
      .command('info')
      .description('Show daemon version and system information')
      .action(async () => {
        await this.run('Info', () => this.showInfo());
      });

    this.program
      .command('ps')
      .description('List containers')
      .option('-a, --all', 'Show all containers, not only running ones')
      .option('-n, --limit <n>', 'Show at most n containers')
      .option('-f, --filter <expr>', 'Filter expression passed to the daemon')
      .action(async (options: PsOptions) => {
        await this.run('List', () => this.listContainers(options));
      });

    this.program
      .command('create')
      .description('Create a container')
      .argument('<name>', 'Container name')
      .argument('<image>', 'Image reference')
      .argument('[cmd...]', 'Command to run')
      .option('-e, --env <KEY=VALUE>', 'Set an environment variable (repeatable)', collect, [])
      .option('-l, --label <KEY=VALUE>', 'Set a label (repeatable)', collect, [])
      .option('-w, --workdir <dir>', 'Working directory inside the container')
      .action(async (name: string, image: string, cmd: string[], options: CreateOptions) => {
        await this.run('Create', () => this.createContainer(name, image, cmd, options));
      });
  }

  private async run(label: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.error(`❌ ${label} failed:`, describeError(error));
      process.exit(1);
    }
  }

  private createClient(): DockerClient {
    const config = loadConfig(this.program.opts<ConfigOverrides>());
    return DockerClient.fromConfig(config);
  }

  private async showInfo(): Promise<void> {
    const client = this.createClient();
    const info = unwrapResult(await client.version.getVersionInfo());
    console.log(info);
  }

  private async listContainers(options: PsOptions): Promise<void> {
    const client = this.createClient();
    const limit = options.limit !== undefined ? this.parseLimit(options.limit) : undefined;

    const result = options.filter !== undefined
      ? await client.containers.listContainersWithFilter(options.filter, limit)
      : options.all
        ? await client.containers.listAllContainers(limit)
        : await client.containers.listRunningContainers(limit);

    this.displayContainers(unwrapResult(result));
  }

  private async createContainer(name: string, image: string, cmd: string[], options: CreateOptions): Promise<void> {
    const client = this.createClient();
    const builder = new ContainerConfigBuilder(image).cmd(cmd);

    for (const pair of options.env) {
      const [key, value] = this.parsePair(pair, 'environment variable');
      builder.env(key, value);
    }
    for (const pair of options.label) {
      const [key, value] = this.parsePair(pair, 'label');
      builder.label(key, value);
    }
    if (options.workdir) {
      builder.workingDir(options.workdir);
    }

    const response = unwrapResult(await client.containers.createContainer(name, builder.build()));
    console.log(`✅ Created container ${name}: ${response.Id}`);
    response.Warnings?.forEach(warning => console.log(`⚠️ ${warning}`));
  }

  /**
   * Display container list
   */
  private displayContainers(containers: Container[]): void {
    if (containers.length === 0) {
      console.log('No containers found');
      return;
    }

    console.log(`📦 ${containers.length} container${containers.length === 1 ? '' : 's'}:\n`);

    containers.forEach(container => {
      const name = container.Names[0]?.replace(/^\//, '') || container.Id.substring(0, 12);
      console.log(`   • ${name} (${container.Id.substring(0, 12)}) ${container.Image} - ${container.Status}`);
    });
  }

  private parseLimit(value: string): number {
    const limit = Number(value);
    if (!Number.isInteger(limit) || limit < 0) {
      throw new Error(`Invalid limit: ${value}`);
    }
    return limit;
  }

  private parsePair(pair: string, kind: string): [string, string] {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new Error(`Invalid ${kind} "${pair}", expected KEY=VALUE`);
    }
    return [pair.slice(0, index), pair.slice(index + 1)];
  }

  /**
   * Run the CLI
   */
  public async parse(argv: string[] = process.argv): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new DocksockCLI();
  cli.parse().catch(error => {
    console.error('❌ CLI Error:', describeError(error));
    process.exit(1);
  });
}

export { DocksockCLI };
