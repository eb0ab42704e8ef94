import {describeError, FetchError, TokenExpiredError} from '../eightsleep/errors.js';
import {ClientLogger} from '../types/index.js';
import {SessionManager} from './session.js';

/**
 * Runs authenticated API operations, recovering from an expired token
 */
export class RetryService {
  constructor(
    private readonly sessions: SessionManager,
    private readonly log?: ClientLogger,
  ) {}

  /**
   * Executes an operation with a valid session token. When the API rejects
   * the token, logs in once and retries the operation exactly once; a second
   * rejection surfaces as FetchError. Other errors are not retried.
   */
  async retryOnExpiredSession<T>(
    operation: (token: string) => Promise<T>,
    operationName: string,
  ): Promise<T> {
    const session = await this.sessions.ensureValid();
    try {
      return await operation(session.token);
    } catch (error) {
      if (!(error instanceof TokenExpiredError)) {
        throw error;
      }

      this.log?.warn(`Session rejected while trying to ${operationName} (${describeError(error)}). Logging in again and retrying once`);
      const refreshed = await this.sessions.refresh();

      try {
        return await operation(refreshed.token);
      } catch (retryError) {
        if (retryError instanceof TokenExpiredError) {
          throw new FetchError(
            `Failed to ${operationName}: session rejected again after re-login`,
            retryError.statusCode,
            {cause: retryError},
          );
        }
        throw retryError;
      }
    }
  }
}
