import type { Executor } from '../execution/types.js';
import { logger } from '../shared/logger.js';
import { composeArgs, targetArgument } from './composer.js';
import { formatReport } from './formatter.js';
import { validateTarget } from './validator.js';
import type { CommandSpec, InvocationRequest } from './types.js';

export interface EngineOptions {
  /** Working directory for the runner; inherited from the service when unset. */
  cwd?: string;
}

/**
 * validate → compose → execute → format. Holds only read-only configuration,
 * so one engine serves any number of concurrent invocations.
 */
export class TestInvocationEngine {
  constructor(
    private readonly command: CommandSpec,
    private readonly executor: Executor,
    private readonly options: EngineOptions = {}
  ) {}

  async runTest(request: InvocationRequest, signal?: AbortSignal): Promise<string> {
    const target = validateTarget(request.file, request.lineNumbers);
    const args = composeArgs(this.command, target);
    const description = targetArgument(target);

    const start = performance.now();
    const outcome = await this.executor.execute(this.command.executable, args, {
      cwd: this.options.cwd,
      signal,
    });
    logger.info(
      { target: description, exitCode: outcome.exitCode, durationMs: Math.round(performance.now() - start) },
      'Test run finished'
    );

    return formatReport(description, outcome);
  }
}
