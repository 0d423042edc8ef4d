import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import type { ValidatedTarget } from './types.js';

export const SPEC_SUFFIX = '_spec.rb';

/**
 * Gate between caller input and the runner's argument vector. Rules apply in
 * order and the first failure is thrown.
 */
export function validateTarget(file: string, lineNumbers: readonly number[] = []): ValidatedTarget {
  if (file.length === 0) {
    throw new RunnerError(RunnerErrorCode.EMPTY_PATH, 'File path must not be empty');
  }
  if (file.includes('\0') || file.includes('\n')) {
    throw new RunnerError(
      RunnerErrorCode.ILLEGAL_CHARACTERS,
      'File path must not contain NUL or newline characters'
    );
  }
  if (file.includes('../')) {
    throw new RunnerError(RunnerErrorCode.PATH_TRAVERSAL, `File path must not contain '../': ${file}`);
  }

  const name = file.startsWith('./') ? file.slice(2) : file;
  if (!name.endsWith(SPEC_SUFFIX)) {
    throw new RunnerError(RunnerErrorCode.BAD_EXTENSION, `File path must end with ${SPEC_SUFFIX}: ${file}`);
  }
  if (name === SPEC_SUFFIX) {
    throw new RunnerError(
      RunnerErrorCode.MALFORMED_NAME,
      `File name must have at least one character before ${SPEC_SUFFIX}: ${file}`
    );
  }
  // A leading dash would reach the runner as an option, not a file.
  if (name.startsWith('-')) {
    throw new RunnerError(RunnerErrorCode.OPTION_LIKE_PATH, `File path must not start with '-': ${file}`);
  }

  const bad = lineNumbers.find(n => !Number.isSafeInteger(n) || n <= 0);
  if (bad !== undefined) {
    throw new RunnerError(
      RunnerErrorCode.NON_POSITIVE_LINE_NUMBER,
      `Line numbers must be positive integers, got ${bad}`,
      { value: bad }
    );
  }

  return { file, lineNumbers: [...lineNumbers] };
}
