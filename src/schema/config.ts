import { z } from 'zod';

/**
 * One server entry in toolwire.yaml.
 * Either names a preset or gives the command to launch.
 */
export const ServerConfigSchema = z
  .object({
    preset: z.string().min(1).optional(),
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().optional(),
    description: z.string().optional(),
    timeout_ms: z.number().int().positive().optional(),
    /** Hub startup fails if a required server cannot start */
    required: z.boolean().default(false),
  })
  .refine((server) => server.preset !== undefined || server.command !== undefined, {
    message: 'Either preset or command is required',
  });

export const DefaultsSchema = z.object({
  timeout_ms: z.number().int().positive().default(30000),
  kill_grace_ms: z.number().int().positive().default(3000),
});

export const ConfigFileSchema = z.object({
  defaults: DefaultsSchema.default({}),
  servers: z.record(ServerConfigSchema).default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type Defaults = z.infer<typeof DefaultsSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
