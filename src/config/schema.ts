import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z.object({
  rspec_cmd: z.string().refine(s => s.trim().length > 0, 'rspec_cmd cannot be empty'),
  transport: z.enum(['sse', 'stdio']),
  hostname: z.string().min(1, 'hostname cannot be empty'),
  // Flags and environment variables arrive as strings; blank and null stay invalid.
  port: z.preprocess(
    value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z.number().int().min(0).max(65535)
  ),
  working_directory: z.string().min(1).optional(),
  log_level: z.enum(LOG_LEVELS),
});

/** Shape accepted from the YAML file: any subset of keys, nothing unknown. */
export const FileConfigSchema = ConfigSchema.partial().strict();

export type ServerConfig = z.infer<typeof ConfigSchema>;
export type TransportKind = ServerConfig['transport'];
export type LogLevel = ServerConfig['log_level'];

/** One configuration source before validation; unset keys fall through to lower layers. */
export type ConfigLayer = { [K in keyof ServerConfig]?: unknown };
