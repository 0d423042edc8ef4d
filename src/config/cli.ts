import { Command, CommanderError, Option } from 'commander';
import type { OutputConfiguration } from 'commander';
import { SERVER_INFO } from '../server.js';
import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import type { ConfigLayer } from './schema.js';

export interface CliOptions {
  /** Flags and their environment variables; flags win. */
  layer: ConfigLayer;
  configPath?: string;
}

type RawOptions = {
  rspecCmd?: string;
  transport?: string;
  hostname?: string;
  port?: string;
  workingDirectory?: string;
  logLevel?: string;
  config?: string;
};

// No commander defaults here: a default would shadow the config file.
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command(SERVER_INFO.name)
    .description('Configurable RSpec runner exposed as an MCP tool over HTTP+SSE or stdio')
    .version(SERVER_INFO.version, '-V, --version', 'Output the current version')
    .addOption(new Option('-c, --rspec-cmd <cmd>', 'Runner command (default: "bundle exec rspec")').env('RSPEC_RUNNER_CMD'))
    .addOption(new Option('-t, --transport <kind>', 'sse or stdio (default: sse)').env('RSPEC_MCP_TRANSPORT'))
    .addOption(new Option('-H, --hostname <host>', 'Bind address for sse (default: 127.0.0.1)').env('RSPEC_MCP_HOSTNAME'))
    .addOption(new Option('-p, --port <port>', 'Port for sse (default: 30301)').env('RSPEC_MCP_PORT'))
    .addOption(new Option('-w, --working-directory <dir>', 'Directory the runner starts in').env('RSPEC_MCP_WORKDIR'))
    .addOption(
      new Option('-l, --log-level <level>', 'fatal|error|warn|info|debug|trace|silent (default: info)').env('LOG_LEVEL')
    )
    .addOption(new Option('--config <path>', 'YAML config file').env('RSPEC_MCP_CONFIG'))
    .allowExcessArguments(false)
    .exitOverride();
  if (output) program.configureOutput(output);
  return program;
}

/**
 * Parse flags, with environment variables as their fallback. Returns null when
 * commander has already printed help or the version and the process should stop.
 */
export function parseCliArgs(argv: string[], output?: OutputConfiguration): CliOptions | null {
  const program = createProgram(output);
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) return null;
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, err instanceof Error ? err.message : String(err));
  }

  const opts = program.opts<RawOptions>();
  // A variable that is set but empty counts as unset; an empty flag value does not.
  const value = <K extends keyof RawOptions>(key: K): string | undefined => {
    const raw = opts[key];
    return raw === '' && program.getOptionValueSource(key) === 'env' ? undefined : raw;
  };

  return {
    layer: {
      rspec_cmd: value('rspecCmd'),
      transport: value('transport'),
      hostname: value('hostname'),
      port: value('port'),
      working_directory: value('workingDirectory'),
      log_level: value('logLevel'),
    },
    configPath: value('config'),
  };
}
