import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import type { ExecuteOptions, Executor, ProcessOutcome } from './types.js';

export interface ExecuteCall {
  executable: string;
  args: string[];
  options: ExecuteOptions;
}

const DEFAULT_OUTCOME: ProcessOutcome = {
  exitCode: 0,
  stdout: 'mock test output',
  stderr: '',
};

/** Executor that never spawns: returns a fixed outcome (or error) and records each call. */
export class CannedExecutor implements Executor {
  readonly calls: ExecuteCall[] = [];
  private readonly outcome: ProcessOutcome | Error;

  constructor(outcome: ProcessOutcome | Error = DEFAULT_OUTCOME) {
    this.outcome = outcome;
  }

  static withResult(exitCode: number, stdout: string, stderr: string): CannedExecutor {
    return new CannedExecutor({ exitCode, stdout, stderr });
  }

  static failing(error: Error): CannedExecutor {
    return new CannedExecutor(error);
  }

  async execute(
    executable: string,
    args: readonly string[],
    options: ExecuteOptions = {}
  ): Promise<ProcessOutcome> {
    this.calls.push({ executable, args: [...args], options });
    if (options.signal?.aborted) {
      throw new RunnerError(RunnerErrorCode.CANCELLED, `Test run cancelled: ${executable}`, { executable });
    }
    if (this.outcome instanceof Error) throw this.outcome;
    return { ...this.outcome };
  }
}
