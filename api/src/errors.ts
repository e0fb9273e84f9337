export class FetchFailure extends Error {
  readonly errors: string[];

  constructor(target: string, errors: string[]) {
    super(`no prefixes could be retrieved for ${target}: ${errors.join("; ")}`);
    this.name = "FetchFailure";
    this.errors = errors;
  }
}

export class StorageFailure extends Error {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`storage operation ${operation} failed: ${reason}`, { cause });
    this.name = "StorageFailure";
  }
}

export class SubmissionFailure extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = "SubmissionFailure";
    this.statusCode = statusCode;
  }
}

/** Raised by a fetch strategy for one source or address family. */
export class FetcherError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable = true) {
    super(message);
    this.name = "FetcherError";
    this.retryable = retryable;
  }
}

/** A read needed data that has not been recorded yet. */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`configuration validation failed:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
