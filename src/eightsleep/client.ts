import axios, {AxiosInstance, AxiosRequestConfig, AxiosResponse} from 'axios';
import {API_URL, ClientLogger, DEFAULT_HEADERS, DEFAULT_TIMEOUT_MS} from '../types/index.js';
import {AuthError, FetchError, TokenExpiredError} from './errors.js';

export type ClientResponse<T> = {
  data: T;
  status: number;
};

export type ClientOptions = {
  apiUrl?: string;
  timeoutMs?: number;
  httpClient?: AxiosInstance;
  log?: ClientLogger;
};

export type HeatingLevelUpdate = {
  leftHeatingDuration?: number;
  leftTargetHeatingLevel?: number;
  rightHeatingDuration?: number;
  rightTargetHeatingLevel?: number;
};

/**
 * Thin transport over the Eight Sleep REST API. Bodies come back undecoded;
 * HTTP failures are translated into the client's error types.
 */
export class Client {
  readonly apiUrl: string;
  private readonly axiosClient: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly log?: ClientLogger;

  constructor(options: ClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    // Never replaced: base URL, timeout and headers travel with each request.
    this.axiosClient = options.httpClient ?? axios.create();
    this.log = options.log;
  }

  headers(token?: string): Record<string, string> {
    if (token === undefined) {
      return {...DEFAULT_HEADERS};
    }
    return {
      ...DEFAULT_HEADERS,
      'Authorization': `Bearer ${token}`,
    };
  }

  private requestConfig(token: string | undefined, extra: AxiosRequestConfig = {}): AxiosRequestConfig {
    return {
      ...extra,
      baseURL: this.apiUrl,
      timeout: this.timeoutMs,
      headers: this.headers(token),
    };
  }

  private logResponse<T>(response: AxiosResponse<T>, method: string, endpoint: string): void {
    if (this.log) {
      this.log.debug(`API ${method} ${endpoint} - Response Code: ${response.status}`);
    }
  }

  private handleError(error: unknown, method: string, endpoint: string): never {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const statusText = error.response?.statusText || error.message || 'Unknown error';

      if (this.log) {
        if (status === undefined) {
          this.log.error(`API ${method} ${endpoint} - Request failed: ${error.message}`);
        } else {
          this.log.error(`API ${method} ${endpoint} - Error ${status}: ${statusText}`);
        }
      }

      if (status === 401) {
        throw new TokenExpiredError(`API error ${status}: ${statusText}`, status, {cause: error});
      }
      throw new FetchError(
        status === undefined ? `API error: ${error.message}` : `API error ${status}: ${statusText}`,
        status,
        {cause: error},
      );
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    if (this.log) {
      this.log.error(`API ${method} ${endpoint} - Unexpected error: ${errorMessage}`);
    }
    throw new FetchError(`API error: ${errorMessage}`, undefined, {cause: error});
  }

  private async get(endpoint: string, token: string, params?: Record<string, string>): Promise<ClientResponse<unknown>> {
    try {
      const response = await this.axiosClient.get<unknown>(endpoint, this.requestConfig(token, {params}));
      this.logResponse(response, 'GET', endpoint);
      return {data: response.data, status: response.status};
    } catch (error) {
      this.handleError(error, 'GET', endpoint);
    }
  }

  /**
   * Exchanges credentials for a session. Rejected credentials surface as AuthError.
   */
  async login(email: string, password: string): Promise<ClientResponse<unknown>> {
    const endpoint = '/login';
    const body = new URLSearchParams({email, password});
    try {
      const response = await this.axiosClient.post<unknown>(endpoint, body, this.requestConfig(undefined));
      this.logResponse(response, 'POST', endpoint);
      return {data: response.data, status: response.status};
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status === 400 || status === 401 || status === 403) {
        this.log?.error(`API POST ${endpoint} - Login rejected (${status})`);
        throw new AuthError('Invalid e-mail or password', status, {cause: error});
      }
      this.handleError(error, 'POST', endpoint);
    }
  }

  async getMe(token: string): Promise<ClientResponse<unknown>> {
    return this.get('/users/me', token);
  }

  async getUserProfile(token: string, userId: string): Promise<ClientResponse<unknown>> {
    return this.get(`/users/${encodeURIComponent(userId)}`, token);
  }

  async getDeviceUsers(token: string, deviceId: string): Promise<ClientResponse<unknown>> {
    return this.get(`/devices/${encodeURIComponent(deviceId)}`, token, {filter: 'ownerId,leftUserId,rightUserId'});
  }

  async getDeviceData(token: string, deviceId: string): Promise<ClientResponse<unknown>> {
    return this.get(`/devices/${encodeURIComponent(deviceId)}`, token, {offlineView: 'true'});
  }

  async getIntervals(token: string, userId: string): Promise<ClientResponse<unknown>> {
    return this.get(`/users/${encodeURIComponent(userId)}/intervals`, token);
  }

  async getTrends(token: string, userId: string, timezone: string, from: string, to: string): Promise<ClientResponse<unknown>> {
    return this.get(`/users/${encodeURIComponent(userId)}/trends`, token, {tz: timezone, from, to});
  }

  async setHeatingLevel(token: string, deviceId: string, update: HeatingLevelUpdate): Promise<ClientResponse<unknown>> {
    const endpoint = `/devices/${encodeURIComponent(deviceId)}`;
    try {
      const response = await this.axiosClient.put<unknown>(endpoint, update, this.requestConfig(token));
      this.logResponse(response, 'PUT', endpoint);
      return {data: response.data, status: response.status};
    } catch (error) {
      this.handleError(error, 'PUT', endpoint);
    }
  }
}
