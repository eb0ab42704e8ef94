import {describeError} from '../eightsleep/errors.js';
import {
  ClientLogger,
  DEFAULT_DEVICE_POLLING_INTERVAL_SECONDS,
  DEFAULT_USER_POLLING_INTERVAL_MINUTES,
  MIN_DEVICE_POLLING_INTERVAL_SECONDS,
  MIN_USER_POLLING_INTERVAL_MINUTES,
} from '../types/index.js';

export interface PollingConfig {
  devicePollingIntervalSeconds?: number;
  userPollingIntervalMinutes?: number;
}

/**
 * The part of the client the poll loop drives.
 */
export interface Pollable {
  updateDeviceData(): Promise<void>;
  updateUserData(): Promise<void>;
}

type PollKind = 'device' | 'user';

/**
 * Host-side timer loop calling the client's update methods at the documented
 * cadences. Polls never overlap: the next one is scheduled once the previous
 * one has settled.
 */
export class PollingService {
  private deviceTimeout: NodeJS.Timeout | undefined;
  private userTimeout: NodeJS.Timeout | undefined;
  private running = false;
  private busy: Promise<void> = Promise.resolve();
  private readonly devicePollingIntervalMs: number;
  private readonly userPollingIntervalMs: number;

  constructor(
    private readonly log: ClientLogger,
    config?: PollingConfig,
  ) {
    // Set up device polling interval from config or use default
    const configuredDeviceSeconds = config?.devicePollingIntervalSeconds;
    if (configuredDeviceSeconds !== undefined) {
      if (configuredDeviceSeconds < MIN_DEVICE_POLLING_INTERVAL_SECONDS) {
        this.log.warn(`Device polling interval must be at least ${MIN_DEVICE_POLLING_INTERVAL_SECONDS} seconds. Using ${MIN_DEVICE_POLLING_INTERVAL_SECONDS} seconds.`);
        this.devicePollingIntervalMs = MIN_DEVICE_POLLING_INTERVAL_SECONDS * 1000;
      } else {
        this.devicePollingIntervalMs = configuredDeviceSeconds * 1000;
        this.log.debug(`Using configured device polling interval of ${configuredDeviceSeconds} seconds`);
      }
    } else {
      this.devicePollingIntervalMs = DEFAULT_DEVICE_POLLING_INTERVAL_SECONDS * 1000;
      this.log.debug(`Using default device polling interval of ${DEFAULT_DEVICE_POLLING_INTERVAL_SECONDS} seconds`);
    }

    // Set up user polling interval from config or use default
    const configuredUserMinutes = config?.userPollingIntervalMinutes;
    if (configuredUserMinutes !== undefined) {
      if (configuredUserMinutes < MIN_USER_POLLING_INTERVAL_MINUTES) {
        this.log.warn(`User polling interval must be at least ${MIN_USER_POLLING_INTERVAL_MINUTES} minute. Using ${MIN_USER_POLLING_INTERVAL_MINUTES} minute.`);
        this.userPollingIntervalMs = MIN_USER_POLLING_INTERVAL_MINUTES * 60 * 1000;
      } else {
        this.userPollingIntervalMs = configuredUserMinutes * 60 * 1000;
        this.log.debug(`Using configured user polling interval of ${configuredUserMinutes} minutes`);
      }
    } else {
      this.userPollingIntervalMs = DEFAULT_USER_POLLING_INTERVAL_MINUTES * 60 * 1000;
      this.log.debug(`Using default user polling interval of ${DEFAULT_USER_POLLING_INTERVAL_MINUTES} minutes`);
    }
  }

  get intervals(): {deviceMs: number; userMs: number} {
    return {deviceMs: this.devicePollingIntervalMs, userMs: this.userPollingIntervalMs};
  }

  /**
   * Starts polling. The first device and user polls run after one interval.
   */
  startPolling(client: Pollable): void {
    this.stopPolling();
    this.running = true;
    this.log.debug(`Starting polling every ${this.devicePollingIntervalMs / 1000}s (device) and ${this.userPollingIntervalMs / 60000}m (user)`);
    this.scheduleNextPoll(client, 'device');
    this.scheduleNextPoll(client, 'user');
  }

  /**
   * Stops the polling service
   */
  stopPolling(): void {
    this.running = false;
    if (this.deviceTimeout) {
      clearTimeout(this.deviceTimeout);
      this.deviceTimeout = undefined;
    }
    if (this.userTimeout) {
      clearTimeout(this.userTimeout);
      this.userTimeout = undefined;
    }
    this.log.debug('Polling stopped');
  }

  /**
   * Runs one poll of the given kind after any poll still in flight. Failures
   * are logged, not thrown, so a transient error never ends the loop.
   */
  poll(client: Pollable, kind: PollKind): Promise<void> {
    const run = async (): Promise<void> => {
      try {
        if (kind === 'device') {
          await client.updateDeviceData();
        } else {
          await client.updateUserData();
        }
      } catch (error) {
        this.log.error(`Error polling ${kind} data: ${describeError(error)}`);
      }
    };
    this.busy = this.busy.then(run);
    return this.busy;
  }

  private scheduleNextPoll(client: Pollable, kind: PollKind): void {
    const interval = kind === 'device' ? this.devicePollingIntervalMs : this.userPollingIntervalMs;
    const timeout = setTimeout(() => {
      this.poll(client, kind)
        .then(() => {
          if (this.running) {
            this.scheduleNextPoll(client, kind);
          }
        })
        .catch(error => this.log.error(`Polling loop failed: ${describeError(error)}`));
    }, interval);

    if (kind === 'device') {
      this.deviceTimeout = timeout;
    } else {
      this.userTimeout = timeout;
    }
  }
}
