import type {AxiosInstance} from 'axios';
import type {Logging} from 'homebridge';

/**
 * The subset of the Homebridge logger the client writes to. A platform's
 * `log` satisfies it as is.
 */
export type ClientLogger = Pick<Logging, 'debug' | 'info' | 'warn' | 'error'>;

export type BedSide = 'left' | 'right';

export interface EightSleepOptions {
  /** Also track the user on the other side of the bed. */
  partner?: boolean;
  apiUrl?: string;
  timeoutMs?: number;
  /** Externally owned HTTP client. It is used as is and never replaced. */
  httpClient?: AxiosInstance;
  log?: ClientLogger;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export const API_URL = 'https://client-api.8slp.net/v1';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'api-key': 'api-key',
  'application-id': 'morphy-app-id',
  'user-agent': 'Eight%20AppStore/11 CFNetwork/808.2.16 Darwin/16.3.0',
  'accept-language': 'en-gb',
  'accept': '*/*',
  'app-version': '1.10.0',
};

export const DEFAULT_TIMEOUT_MS = 10000;
export const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;    // Re-login this long before the token expires
export const DEVICE_HISTORY_LENGTH = 10;              // Readings kept per device for presence detection
export const TREND_WINDOW_DAYS = 2;                   // Trends are fetched for today +/- this many days
export const HEATING_LEVEL_MIN = 10;                  // Lowest target the bed accepts
export const HEATING_LEVEL_MAX = 100;
export const STALE_PRESENCE_SECONDS = 1800;          // A sleep stage older than this reads as awake

// Documented poll cadences
export const DEFAULT_DEVICE_POLLING_INTERVAL_SECONDS = 60;
export const DEFAULT_USER_POLLING_INTERVAL_MINUTES = 5;
export const MIN_DEVICE_POLLING_INTERVAL_SECONDS = 5;
export const MIN_USER_POLLING_INTERVAL_MINUTES = 1;
