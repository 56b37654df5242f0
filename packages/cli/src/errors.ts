export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, exitCode = 1, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

/**
 * The CF API answered, but the body carries an `error_code`, is not JSON, or
 * is non-empty where an empty body was expected.
 */
export class ApiError extends CliError {
  readonly path: string;
  readonly body: string;

  constructor(path: string, body: string, message: string, code = "API_ERROR") {
    super(code, message, 2, { path, body });
    this.path = path;
    this.body = body;
  }
}

export class NotFoundError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", message, 1, details);
  }
}

/** The `cf` process exited non-zero or an HTTP request never got a response. */
export class TransportError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TRANSPORT_ERROR", message, 2, details);
  }
}

export class ValidationError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, 1, details);
  }
}

export function errorEnvelope(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false as const,
    error: {
      code,
      message,
      details
    }
  };
}
