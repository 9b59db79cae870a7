export type ErrorKind =
  | "SourceUnavailable"
  | "NotFound"
  | "ComputeFailed"
  | "Timeout"
  | "ConnectionLost"
  | "HeartbeatTimeout"
  | "Config";

/**
 * Base class for failures scoped to one request, session or cache key.
 */
export class RelayError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class SourceUnavailableError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SourceUnavailable", message, options);
  }
}

export class NotFoundError extends RelayError {
  constructor(message: string) {
    super("NotFound", message);
  }
}

export class ComputeFailedError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ComputeFailed", message, options);
  }
}

export class TimeoutError extends RelayError {
  constructor(message: string) {
    super("Timeout", message);
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super("Config", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function httpStatusFor(error: unknown): number {
  if (!(error instanceof RelayError)) {
    return 500;
  }
  switch (error.kind) {
    case "NotFound":
      return 404;
    case "SourceUnavailable":
    case "ComputeFailed":
      return 502;
    case "Timeout":
      return 504;
    default:
      return 500;
  }
}
