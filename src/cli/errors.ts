export interface CliErrorOptions {
  /** Expected failure caused by input; printed without the "Error:" prefix */
  isUserError?: boolean;
  cause?: unknown;
}

export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? false;
  }
}

/** Failure that has already been reported; exits non-zero without printing. */
export class SilentError extends CliError {
  constructor(message = "Failed.") {
    super(message, { isUserError: true });
    this.name = "SilentError";
  }
}
