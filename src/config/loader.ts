// Config loader: defaults < YAML file < CLI layer (flags, then their environment variables).
// The merged result is validated once with ConfigSchema; anything invalid stops startup.
import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import { ConfigSchema, FileConfigSchema } from './schema.js';
import type { ConfigLayer, ServerConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'rspec-runner-mcp', 'config.yaml');

export const DEFAULT_CONFIG: ServerConfig = {
  rspec_cmd: 'bundle exec rspec',
  transport: 'sse',
  hostname: '127.0.0.1',
  port: 30301,
  log_level: 'info',
};

export interface LoadConfigOptions {
  /** From --config or RSPEC_MCP_CONFIG. */
  configPath?: string;
  cli?: ConfigLayer;
}

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  fileFound: boolean;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConfigResult> {
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const file = await readConfigFile(configPath);
  const config = resolveConfig([file ?? {}, options.cli ?? {}]);
  return { config, configPath, fileFound: file !== null };
}

/** Returns null when the file does not exist. */
export async function readConfigFile(configPath: string): Promise<ConfigLayer | null> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, `Cannot read config file: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, `Config file is not valid YAML: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  // An empty file parses to null.
  if (parsed === null || parsed === undefined) return {};

  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new RunnerError(
      RunnerErrorCode.INVALID_CONFIG,
      `Invalid config file ${configPath}: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

/** Merge layers over DEFAULT_CONFIG (later layers win) and validate the result. */
export function resolveConfig(layers: ConfigLayer[]): ServerConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, `Invalid configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
