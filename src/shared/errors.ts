export enum RunnerErrorCode {
  EMPTY_PATH = 'EMPTY_PATH',
  ILLEGAL_CHARACTERS = 'ILLEGAL_CHARACTERS',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',
  BAD_EXTENSION = 'BAD_EXTENSION',
  MALFORMED_NAME = 'MALFORMED_NAME',
  OPTION_LIKE_PATH = 'OPTION_LIKE_PATH',
  NON_POSITIVE_LINE_NUMBER = 'NON_POSITIVE_LINE_NUMBER',
  SPAWN_FAILED = 'SPAWN_FAILED',
  CANCELLED = 'CANCELLED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

const VALIDATION_CODES: ReadonlySet<RunnerErrorCode> = new Set([
  RunnerErrorCode.EMPTY_PATH,
  RunnerErrorCode.ILLEGAL_CHARACTERS,
  RunnerErrorCode.PATH_TRAVERSAL,
  RunnerErrorCode.BAD_EXTENSION,
  RunnerErrorCode.MALFORMED_NAME,
  RunnerErrorCode.OPTION_LIKE_PATH,
  RunnerErrorCode.NON_POSITIVE_LINE_NUMBER,
]);

export class RunnerError extends Error {
  readonly code: RunnerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RunnerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RunnerError';
    this.code = code;
    this.context = context;
  }
}

/** True for errors caused by caller input; these never reach the executor. */
export function isValidationError(err: unknown): err is RunnerError {
  return err instanceof RunnerError && VALIDATION_CODES.has(err.code);
}
