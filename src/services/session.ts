import {Client} from '../eightsleep/client.js';
import {AuthError} from '../eightsleep/errors.js';
import {ClientLogger, TOKEN_REFRESH_MARGIN_MS} from '../types/index.js';
import type {Session} from '../types/models.js';
import {Mapper} from '../utils/mapper.js';

/**
 * Owns the single session of a client: logs in, re-logs in shortly before
 * the token expires, and drops the session on stop or rejected credentials.
 */
export class SessionManager {
  private session: Session | null = null;

  constructor(
    private readonly client: Client,
    private readonly mapper: Mapper,
    private readonly email: string,
    private readonly password: string,
    private readonly now: () => number,
    private readonly log?: ClientLogger,
  ) {}

  get current(): Session | null {
    return this.session;
  }

  /**
   * Logs in and replaces the current session. On AuthError the session is
   * cleared and later calls to ensureValid fail until login succeeds again.
   */
  async login(): Promise<Session> {
    try {
      const response = await this.client.login(this.email, this.password);
      const session = this.mapper.toSession(response.data);
      this.session = session;
      this.log?.debug(`Logged in as ${session.userId}, token valid until ${session.expiry.toISOString()}`);
      return session;
    } catch (error) {
      if (error instanceof AuthError) {
        this.invalidate();
      }
      throw error;
    }
  }

  /**
   * Returns a session that is valid for at least the refresh margin,
   * logging in again when needed. Throws AuthError before the first login.
   */
  async ensureValid(): Promise<Session> {
    if (this.session === null) {
      throw new AuthError('Not logged in; call start() first');
    }
    if (this.session.expiry.getTime() - this.now() <= TOKEN_REFRESH_MARGIN_MS) {
      this.log?.debug('Session token expires soon, logging in again');
      return this.login();
    }
    return this.session;
  }

  /**
   * Unconditional re-login, used after the API rejected the current token.
   */
  async refresh(): Promise<Session> {
    if (this.session === null) {
      throw new AuthError('Not logged in; call start() first');
    }
    return this.login();
  }

  invalidate(): void {
    this.session = null;
  }
}
