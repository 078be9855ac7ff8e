import { DocksockCLI } from '../index';
import { DockerClient } from '../../clients/DockerClient';
import { exitedContainer, httpResponse } from '../../api/__tests__/fixtures';

describe('DocksockCLI', () => {
  let send: jest.Mock<Promise<string | undefined>, [string]>;
  let fromConfig: jest.SpyInstance;
  let consoleOutput: string[];
  let consoleErrors: string[];
  let originalDockerHost: string | undefined;

  beforeEach(() => {
    originalDockerHost = process.env.DOCKER_HOST;
    delete process.env.DOCKER_HOST;

    send = jest.fn();
    const client = new DockerClient({ send });
    fromConfig = jest.spyOn(DockerClient, 'fromConfig').mockReturnValue(client);

    consoleOutput = [];
    consoleErrors = [];
    jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      consoleOutput.push(args.join(' '));
    });
    jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      consoleErrors.push(args.join(' '));
    });
    jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalDockerHost === undefined) {
      delete process.env.DOCKER_HOST;
    } else {
      process.env.DOCKER_HOST = originalDockerHost;
    }
  });

  function run(...args: string[]): Promise<void> {
    return new DocksockCLI().parse(['node', 'docksock', ...args]);
  }

  function sentRequestLine(call: number = 0): string {
    return send.mock.calls[call][0].split('\r\n')[0];
  }

  describe('info', () => {
    it('should print the daemon info', async () => {
      send.mockResolvedValue(httpResponse('{"ServerVersion":"24.0.7"}'));

      await run('info');

      expect(sentRequestLine()).toBe('GET /info HTTP/1.1');
      expect(consoleOutput).toEqual(['{"ServerVersion":"24.0.7"}']);
    });

    it('should pass global options into the configuration', async () => {
      send.mockResolvedValue(httpResponse('{}'));

      await run('-H', 'unix:///tmp/other.sock', '--api-version', 'v1.41', 'info');

      expect(fromConfig).toHaveBeenCalledWith(
        expect.objectContaining({ socketPath: '/tmp/other.sock', apiVersion: 'v1.41' })
      );
    });

    it('should exit with an error when the daemon does not answer', async () => {
      send.mockResolvedValue(undefined);

      await expect(run('info')).rejects.toThrow('exit 1');

      expect(consoleErrors).toEqual(['❌ Info failed: Got no response from docker host']);
    });
  });

  describe('ps', () => {
    it('should list running containers by default', async () => {
      send.mockResolvedValue(httpResponse('[]'));

      await run('ps');

      expect(sentRequestLine()).toBe('GET /containers/json?size=true HTTP/1.1');
      expect(consoleOutput).toEqual(['No containers found']);
    });

    it('should list all containers with a limit', async () => {
      send.mockResolvedValue(httpResponse(JSON.stringify([exitedContainer])));

      await run('ps', '--all', '--limit', '2');

      expect(sentRequestLine()).toBe('GET /containers/json?all=true&size=true&limit=2 HTTP/1.1');
      expect(consoleOutput).toEqual([
        '📦 1 container:\n',
        '   • job (1f2e3d4c5b6a) alpine:3.19 - Exited (0) 5 minutes ago'
      ]);
    });

    it('should pass the filter to the daemon', async () => {
      send.mockResolvedValue(httpResponse('[]'));

      await run('ps', '-f', 'status=exited');

      expect(sentRequestLine()).toBe('GET /containers/json?all=true&size=true&filter=status%3Dexited HTTP/1.1');
    });

    it('should reject an invalid limit', async () => {
      await expect(run('ps', '-n', 'abc')).rejects.toThrow('exit 1');

      expect(consoleErrors).toEqual(['❌ List failed: Invalid limit: abc']);
      expect(send).not.toHaveBeenCalled();
    });

    it('should report a body that cannot be decoded', async () => {
      send.mockResolvedValue(httpResponse('{"message":"server error"}', '500 Internal Server Error'));

      await expect(run('ps')).rejects.toThrow('exit 1');

      expect(consoleErrors).toEqual([
        '❌ List failed: Error while deserializing JSON response: <root>: Expected array, received object'
      ]);
    });
  });

  describe('create', () => {
    it('should create a container from arguments and options', async () => {
      send.mockResolvedValue(httpResponse('{"Id":"abc123","Warnings":["low memory"]}', '201 Created'));

      await run('create', 'job', 'alpine:3.19', 'echo', 'hi', '-e', 'MODE=test', '-l', 'team=infra', '-w', '/srv');

      const request = send.mock.calls[0][0];
      const body = JSON.parse(request.slice(request.indexOf('\r\n\r\n') + 4));
      expect(sentRequestLine()).toBe('POST /containers/create?name=job HTTP/1.1');
      expect(body).toMatchObject({
        Image: 'alpine:3.19',
        Cmd: ['echo', 'hi'],
        Env: ['MODE=test'],
        Labels: { team: 'infra' },
        WorkingDir: '/srv'
      });
      expect(consoleOutput).toEqual(['✅ Created container job: abc123', '⚠️ low memory']);
    });

    it('should reject an environment entry without value separator', async () => {
      await expect(run('create', 'job', 'alpine:3.19', '-e', 'MODE')).rejects.toThrow('exit 1');

      expect(consoleErrors).toEqual(['❌ Create failed: Invalid environment variable "MODE", expected KEY=VALUE']);
      expect(send).not.toHaveBeenCalled();
    });
  });
});
