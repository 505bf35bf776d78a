/**
 * Statuses the relay may answer with. Provider statuses outside this list are
 * reported as 502.
 */
export const ERROR_STATUSES = [
  400, 401, 402, 403, 404, 408, 409, 413, 422, 429, 500, 502, 503, 504,
] as const;

export type ErrorStatus = (typeof ERROR_STATUSES)[number];

export function toErrorStatus(status: number, fallback: ErrorStatus = 502): ErrorStatus {
  return ERROR_STATUSES.find((s) => s === status) ?? fallback;
}

/** Base for every error the relay turns into a `{ error }` response. */
export class RelayError extends Error {
  readonly status: ErrorStatus;

  constructor(status: ErrorStatus, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
    this.status = status;
  }
}

export class BadRequestError extends RelayError {
  constructor(message: string) {
    super(400, message);
    this.name = "BadRequestError";
  }
}

export class InvalidModelError extends RelayError {
  readonly model: string;

  constructor(model: string) {
    super(400, model ? `Invalid model: ${model}` : "Invalid model: no model given");
    this.name = "InvalidModelError";
    this.model = model;
  }
}

/** The provider answered, but with an error status or an unusable body. */
export class UpstreamError extends RelayError {
  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(toErrorStatus(status), message, options);
    this.name = "UpstreamError";
  }
}

/** The provider could not be reached, or did not answer in time. */
export class TransportError extends RelayError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, options?: { cause?: unknown }) {
    super(timedOut ? 504 : 502, message, options);
    this.name = "TransportError";
    this.timedOut = timedOut;
  }
}

export class ToolExecutionError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, `Function execution failed: ${message}`, options);
    this.name = "ToolExecutionError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message.trim() || err.name;
  }
  return String(err);
}
