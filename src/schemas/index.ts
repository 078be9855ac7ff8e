import { z } from 'zod';

/**
 * Wire schemas for the Docker engine payloads this client reads and writes.
 * Field names follow the engine's PascalCase JSON.
 */

export const PortSchema = z.object({
  IP: z.string().optional(),
  PrivatePort: z.number().int().nonnegative(),
  // Unpublished ports come back without a public side
  PublicPort: z.number().int().nonnegative().optional(),
  Type: z.string()
});

export type Port = z.infer<typeof PortSchema>;

export const HostConfigSchema = z.object({
  NetworkMode: z.string()
});

export type HostConfig = z.infer<typeof HostConfigSchema>;

export const MountSchema = z.object({
  Name: z.string().optional(),
  Source: z.string(),
  Destination: z.string(),
  Driver: z.string().optional(),
  Mode: z.string(),
  RW: z.boolean(),
  Propagation: z.string()
});

export type Mount = z.infer<typeof MountSchema>;

export const ContainerSchema = z.object({
  Id: z.string(),
  Names: z.array(z.string()),
  Image: z.string(),
  ImageID: z.string(),
  Command: z.string(),
  State: z.string(),
  Status: z.string(),
  Ports: z.array(PortSchema),
  Labels: z.record(z.string()).nullable().optional(),
  SizeRw: z.number().int().nonnegative().optional(),
  SizeRootFs: z.number().int().nonnegative().default(0),
  HostConfig: HostConfigSchema,
  Mounts: z.array(MountSchema)
});

export type Container = z.infer<typeof ContainerSchema>;

export const ContainerListSchema = z.array(ContainerSchema);

export const ContainerConfigSchema = z.object({
  Image: z.string().min(1, 'Image must not be empty'),
  Cmd: z.array(z.string()),
  Hostname: z.string(),
  Domainname: z.string(),
  User: z.string(),
  AttachStdin: z.boolean(),
  AttachStdout: z.boolean(),
  AttachStderr: z.boolean(),
  Tty: z.boolean(),
  OpenStdin: z.boolean(),
  StdinOnce: z.boolean(),
  Env: z.array(z.string()),
  Entrypoint: z.string(),
  Labels: z.record(z.string()).nullable(),
  WorkingDir: z.string()
});

export type ContainerConfig = z.infer<typeof ContainerConfigSchema>;

export const CreateContainerResponseSchema = z.object({
  Id: z.string().min(1),
  Warnings: z.array(z.string()).nullable().optional()
});

export type CreateContainerResponse = z.infer<typeof CreateContainerResponseSchema>;
