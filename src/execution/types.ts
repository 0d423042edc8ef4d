/** Exit code reported when the child was terminated by a signal instead of exiting. */
export const SIGNAL_EXIT_CODE = -1;

export interface ProcessOutcome {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ExecuteOptions {
  cwd?: string;
  /** Aborting kills the child and rejects with CANCELLED. */
  signal?: AbortSignal;
}

/**
 * Capability to run an external program to completion. ProcessExecutor spawns
 * real children; CannedExecutor returns fixed outcomes for tests.
 */
export interface Executor {
  execute(executable: string, args: readonly string[], options?: ExecuteOptions): Promise<ProcessOutcome>;
}
