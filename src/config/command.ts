import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import type { CommandSpec } from '../rspec/types.js';

/**
 * Split the configured runner command on whitespace. Quoting is not
 * interpreted: `"my dir/rspec"` becomes two words.
 */
export function parseBaseCommand(raw: string): CommandSpec {
  const [executable, ...baseArgs] = raw.split(/\s+/).filter(Boolean);
  if (executable === undefined) {
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, 'rspec command cannot be empty');
  }
  return Object.freeze({ executable, baseArgs: Object.freeze(baseArgs) });
}
