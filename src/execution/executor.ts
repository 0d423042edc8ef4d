// Process execution boundary: every test run goes through ProcessExecutor.execute().
// No shell is involved; the argument vector reaches the child exactly as composed.
import execa from 'execa';
import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SIGNAL_EXIT_CODE } from './types.js';
import type { ExecuteOptions, Executor, ProcessOutcome } from './types.js';

export class ProcessExecutor implements Executor {
  async execute(
    executable: string,
    args: readonly string[],
    options: ExecuteOptions = {}
  ): Promise<ProcessOutcome> {
    const { cwd, signal } = options;
    if (signal?.aborted) throw cancelled(executable);

    logger.debug({ executable, args, cwd }, 'Spawning process');
    const subprocess = execa(executable, [...args], {
      cwd,
      stdin: 'ignore',
      encoding: 'utf8',
      // Output is returned in full; a trailing newline is part of it.
      stripFinalNewline: false,
      maxBuffer: Infinity,
      reject: false,
      windowsHide: true,
    });

    const onAbort = (): void => {
      subprocess.cancel();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    let result: Awaited<typeof subprocess>;
    try {
      result = await subprocess;
    } catch (err) {
      throw spawnFailed(executable, err);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (result.isCanceled || signal?.aborted) throw cancelled(executable);

    let exitCode: number;
    if (result.signal !== undefined) {
      exitCode = SIGNAL_EXIT_CODE;
    } else if (typeof result.exitCode === 'number') {
      exitCode = result.exitCode;
    } else {
      // With reject: false, a child that never started resolves with the spawn
      // error itself: no exit code and no signal.
      throw spawnFailed(executable, result);
    }

    return { exitCode, stdout: result.stdout, stderr: result.stderr };
  }
}

function spawnFailed(executable: string, cause: unknown): RunnerError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new RunnerError(RunnerErrorCode.SPAWN_FAILED, `Command execution failed: ${detail.trim()}`, {
    executable,
  });
}

function cancelled(executable: string): RunnerError {
  return new RunnerError(RunnerErrorCode.CANCELLED, `Test run cancelled: ${executable}`, { executable });
}
