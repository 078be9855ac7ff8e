export const runningContainer = {
  Id: '8dfafdbc3a40f3b2c4b0f0e4d1a5c6b7e8f90123456789abcdef0123456789ab',
  Names: ['/web'],
  Image: 'nginx:1.25',
  ImageID: 'sha256:aaaa',
  Command: 'nginx -g \'daemon off;\'',
  State: 'running',
  Status: 'Up 2 hours',
  Ports: [
    { IP: '0.0.0.0', PrivatePort: 80, PublicPort: 8080, Type: 'tcp' },
    { PrivatePort: 443, Type: 'tcp' }
  ],
  Labels: { team: 'infra' },
  SizeRw: 12288,
  SizeRootFs: 187000000,
  HostConfig: { NetworkMode: 'bridge' },
  Mounts: [
    {
      Name: 'web-data',
      Source: '/var/lib/docker/volumes/web-data/_data',
      Destination: '/usr/share/nginx/html',
      Driver: 'local',
      Mode: 'z',
      RW: true,
      Propagation: ''
    }
  ]
};

export const exitedContainer = {
  Id: '1f2e3d4c5b6a',
  Names: ['/job'],
  Image: 'alpine:3.19',
  ImageID: 'sha256:bbbb',
  Command: 'echo hi',
  State: 'exited',
  Status: 'Exited (0) 5 minutes ago',
  Ports: [],
  Labels: null,
  HostConfig: { NetworkMode: 'host' },
  Mounts: [
    {
      Source: '/tmp',
      Destination: '/data',
      Mode: '',
      RW: false,
      Propagation: 'rprivate'
    }
  ]
};

export function httpResponse(body: string, status: string = '200 OK'): string {
  return `HTTP/1.1 ${status}\r\nContent-Type: application/json\r\nApi-Version: 1.43\r\n\r\n${body}`;
}
