// Error taxonomy shared by the session, record and verification layers.
// Callers map these onto UI affordances: not_authenticated → sign-in prompt,
// network_error / server_error → retry, failed verification → hint.

export type ErrorCode =
  | "not_authenticated"
  | "missing_credentials"
  | "network_error"
  | "server_error"
  | "integrity_error"
  | "missing_location_data"
  | "invalid_format";

export class CheckinCoreError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

export class NotAuthenticatedError extends CheckinCoreError {
  constructor(message = "Authentication required", options?: { cause?: unknown }) {
    super("not_authenticated", message, options);
  }
}

export class MissingCredentialsError extends CheckinCoreError {
  constructor(message = "No authentication credentials found") {
    super("missing_credentials", message);
  }
}

export class NetworkError extends CheckinCoreError {
  constructor(message: string, cause?: unknown) {
    super("network_error", message, { cause });
  }
}

export class ServerError extends CheckinCoreError {
  readonly status: number;
  /** XRPC error name from the response body, e.g. "InvalidRequest". */
  readonly errorName?: string;

  constructor(status: number, message: string, errorName?: string) {
    super("server_error", message);
    this.status = status;
    this.errorName = errorName;
  }
}

export class IntegrityError extends CheckinCoreError {
  constructor(message: string) {
    super("integrity_error", message);
  }
}

export class MissingLocationDataError extends CheckinCoreError {
  readonly uri: string;

  constructor(uri: string) {
    super("missing_location_data", `Checkin record is missing location data: ${uri}`);
    this.uri = uri;
  }
}

export class InvalidFormatError extends CheckinCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid_format", message, options);
  }
}

export function isCheckinCoreError(error: unknown): error is CheckinCoreError {
  return error instanceof CheckinCoreError;
}

/** Wraps anything thrown into the taxonomy; unknown failures count as network errors. */
export function toCheckinCoreError(error: unknown): CheckinCoreError {
  if (isCheckinCoreError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, error);
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: CheckinCoreError };

export async function toResult<T>(promise: Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, error: toCheckinCoreError(error) };
  }
}
