/**
 * Base class for every error the client raises. `statusCode` is set when the
 * failure came with an HTTP response.
 */
export class EightSleepError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Bad credentials, or an operation that needs a session before one exists.
 * Terminal: the client never retries it.
 */
export class AuthError extends EightSleepError {}

/**
 * The API rejected the session token (HTTP 401). Recovered with one re-login.
 */
export class TokenExpiredError extends EightSleepError {}

/**
 * Network, HTTP or payload failure while fetching data.
 */
export class FetchError extends EightSleepError {}

/**
 * The response was not JSON or did not have the expected shape.
 */
export class MalformedResponseError extends FetchError {}

export function describeError(error: unknown): string {
  if (error instanceof EightSleepError && error.statusCode !== undefined) {
    return `HTTP ${error.statusCode}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
