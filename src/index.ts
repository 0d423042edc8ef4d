#!/usr/bin/env node

import { parseCliArgs } from './config/cli.js';
import { parseBaseCommand } from './config/command.js';
import { loadConfig } from './config/loader.js';
import { ProcessExecutor } from './execution/executor.js';
import { TestInvocationEngine } from './rspec/engine.js';
import { SERVER_INFO, createServer } from './server.js';
import { logger } from './shared/logger.js';
import { ToolRegistry } from './tool-registry.js';
import { startSseTransport } from './transport/sse.js';
import { startStdioTransport } from './transport/stdio.js';
import type { RunningTransport } from './transport/types.js';

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  // Help or version was printed.
  if (cli === null) return;

  // ── Config ────────────────────────────────────────────────────
  const { config, configPath, fileFound } = await loadConfig({ configPath: cli.configPath, cli: cli.layer });
  logger.level = config.log_level;
  logger.info({ configPath, fileFound, transport: config.transport }, 'Configuration loaded');

  // ── Engine ────────────────────────────────────────────────────
  const command = parseBaseCommand(config.rspec_cmd);
  const engine = new TestInvocationEngine(command, new ProcessExecutor(), {
    cwd: config.working_directory,
  });
  logger.info({ executable: command.executable, baseArgs: command.baseArgs }, 'Runner command configured');

  // ── Transport ─────────────────────────────────────────────────
  const registry = new ToolRegistry();
  const serverFactory = () => createServer(engine, registry);
  const running: RunningTransport =
    config.transport === 'stdio'
      ? await startStdioTransport(serverFactory)
      : await startSseTransport(serverFactory, { hostname: config.hostname, port: config.port });
  logger.info(`${SERVER_INFO.name} is running: ${running.description}`);

  // In-flight test runs are not awaited; their children may outlive the service.
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(err => {
  logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Fatal startup error');
  process.exit(1);
});
