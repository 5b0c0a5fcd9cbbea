/**
 * Typed error catalog for the store index.
 *
 * Every failure the core raises is a StoreError with a stable `errorCode`,
 * so callers can branch on the code instead of parsing messages.
 */

export class StoreError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Lookup errors

export class NotFoundError extends StoreError {
  constructor(message = "Not found", details?: Record<string, unknown>) {
    super("NOT_FOUND", message, details);
  }
}

export class AmbiguousPathError extends StoreError {
  constructor(path: string, candidates: string[]) {
    super("AMBIGUOUS_PATH", `Path is ambiguous: ${path}`, {
      path,
      candidates,
    });
  }
}

export class NotADirectoryError extends StoreError {
  constructor(path: string) {
    super("NOT_A_DIRECTORY", `Not a directory: ${path}`, { path });
  }
}

export class InvalidMoveError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_MOVE", message, details);
  }
}

// Disk errors

export class ParseError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE_ERROR", message, details);
  }
}

export class IoError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("IO_ERROR", message, details);
  }
}

// Watch errors

export class WatchSetupError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("WATCH_SETUP_FAILED", message, details);
  }
}
