/** Base class for every failure the pipeline reports by name. */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing or malformed credentials. Raised before any network call. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Token exchange rejected or unreadable. */
export class AuthenticationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/** Bad status or unexpected payload from the states endpoint. */
export class FetchError extends PipelineError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchError";
    this.status = status;
  }
}

/** Schema, insert or update failure. The surrounding transaction has been rolled back. */
export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/** A single trajectory row with coordinates outside their domain. */
export class ValidationError extends PipelineError {
  public readonly rowId: number | null;

  constructor(message: string, rowId: number | null = null) {
    super(message);
    this.name = "ValidationError";
    this.rowId = rowId;
  }
}

/** Wrong command-line arguments. */
export class UsageError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
