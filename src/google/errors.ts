/**
 * Error taxonomy shared by credential resolution, service construction and
 * tool dispatch.
 */

export const AUTHENTICATION_ERROR_CODE = -32001;
export const EXTERNAL_API_ERROR_CODE = -32002;

export class AuthenticationError extends Error {
  readonly code = AUTHENTICATION_ERROR_CODE;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type ExternalApiErrorData = {
  status?: number;
  body?: unknown;
};

export class ExternalApiError extends Error {
  readonly code = EXTERNAL_API_ERROR_CODE;
  readonly status: number | undefined;
  readonly body: unknown;

  constructor(message: string, data: ExternalApiErrorData = {}) {
    super(message);
    this.name = "ExternalApiError";
    this.status = data.status;
    this.body = data.body;
  }

  toJSON(): ExternalApiErrorData {
    return { status: this.status, body: this.body };
  }
}

type GaxiosLikeError = Error & {
  code?: unknown;
  status?: unknown;
  response?: { status?: unknown; data?: unknown };
};

function isGaxiosLikeError(err: unknown): err is GaxiosLikeError {
  return (
    err instanceof Error &&
    "response" in err &&
    typeof err.response === "object" &&
    err.response !== null
  );
}

/**
 * Wrap a failure raised by a googleapis call, keeping Google's status and
 * error body untouched. Errors without an HTTP response are returned as-is.
 */
export function toExternalApiError(err: unknown): unknown {
  if (err instanceof ExternalApiError) return err;
  if (!isGaxiosLikeError(err)) return err;
  const status =
    typeof err.response?.status === "number" ? err.response.status : undefined;
  return new ExternalApiError(err.message, {
    status,
    body: err.response?.data,
  });
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
