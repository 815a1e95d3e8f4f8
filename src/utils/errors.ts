/** Bad flags, bad config or bad input files. Raised before any network call. */
export class UsageError extends Error {
  exitCode = 2;
}

/** Raised when the input baseline file cannot be used. */
export class BaselineFileError extends UsageError {}

/** A run that cannot produce any output. */
export class ReportError extends Error {
  exitCode = 1;
}

export class AuthenticationError extends Error {
  exitCode = 1;
}

/** Non-success response from the server; aborts the enclosing collection. */
export class ApiRequestError extends Error {
  exitCode = 1;
  readonly status: number;
  readonly body: string;
  readonly url: string;

  constructor(message: string, status: number, body: string, url: string) {
    super(`${message}: ${status} ${body}`.trim());
    this.name = "ApiRequestError";
    this.status = status;
    this.body = body;
    this.url = url;
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) {
    return error.exitCode;
  }
  if (
    error instanceof ReportError ||
    error instanceof AuthenticationError ||
    error instanceof ApiRequestError
  ) {
    return error.exitCode;
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || "Unexpected error";
  }
  return String(error);
}
