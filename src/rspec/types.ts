export interface InvocationRequest {
  readonly file: string;
  readonly lineNumbers?: readonly number[];
}

/** Output of validateTarget; only ever built by the validator. */
export interface ValidatedTarget {
  readonly file: string;
  readonly lineNumbers: readonly number[];
}

/** The configured runner command, split once at startup. */
export interface CommandSpec {
  readonly executable: string;
  readonly baseArgs: readonly string[];
}
