import type { CommandSpec, ValidatedTarget } from './types.js';

/** Progress output keeps the runner's summary line stable across formatter configs. */
export const RESULT_FORMAT_FLAGS: readonly string[] = ['--format', 'progress'];

/** `file` alone, or `file:37:87` when line numbers select individual examples. */
export function targetArgument(target: ValidatedTarget): string {
  if (target.lineNumbers.length === 0) return target.file;
  return [target.file, ...target.lineNumbers.map(String)].join(':');
}

export function composeArgs(command: CommandSpec, target: ValidatedTarget): string[] {
  return [...command.baseArgs, ...RESULT_FORMAT_FLAGS, targetArgument(target)];
}
