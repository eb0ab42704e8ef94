import {Client} from './eightsleep/client.js';
import {EightSleepError} from './eightsleep/errors.js';
import {EightUser, UserDataSource} from './eightUser.js';
import {DevicePoller} from './services/devicePoller.js';
import {RetryService} from './services/retry.js';
import {SessionManager} from './services/session.js';
import {UserPoller} from './services/userPoller.js';
import {
  BedSide,
  ClientLogger,
  DEVICE_HISTORY_LENGTH,
  EightSleepOptions,
  HEATING_LEVEL_MAX,
  HEATING_LEVEL_MIN,
} from './types/index.js';
import type {Device, UserAssignment, UserProfile, UserSnapshot} from './types/models.js';
import {isValidTimezone} from './utils/dates.js';
import {Mapper, newMapper} from './utils/mapper.js';

/**
 * Client for one Eight Sleep account. Call `start()` once, then
 * `updateDeviceData()` and `updateUserData()` on the host's own timers
 * (about every minute and every five minutes). Update calls must not
 * overlap; a failed update throws and keeps the previous data.
 */
export class EightSleep implements UserDataSource {
  readonly timezone: string;
  private readonly partner: boolean;
  private readonly now: () => number;
  private readonly log?: ClientLogger;

  private readonly client: Client;
  private readonly mapper: Mapper;
  private readonly sessions: SessionManager;
  private readonly retryService: RetryService;
  private readonly devicePoller: DevicePoller;
  private readonly userPoller: UserPoller;

  private deviceIdList: string[] = [];
  private readonly deviceHistory = new Map<string, Device[]>();
  private userList: EightUser[] = [];
  private readonly userSnapshots = new Map<string, UserSnapshot>();
  private readonly userProfiles = new Map<string, UserProfile>();

  constructor(email: string, password: string, timezone: string, options: EightSleepOptions = {}) {
    if (!isValidTimezone(timezone)) {
      throw new RangeError(`Unknown timezone: ${timezone}`);
    }
    this.timezone = timezone;
    this.partner = options.partner ?? false;
    this.now = options.now ?? Date.now;
    this.log = options.log;

    this.client = new Client({
      apiUrl: options.apiUrl,
      timeoutMs: options.timeoutMs,
      httpClient: options.httpClient,
      log: options.log,
    });
    this.mapper = newMapper(this.now);
    this.sessions = new SessionManager(this.client, this.mapper, email, password, this.now, this.log);
    this.retryService = new RetryService(this.sessions, this.log);
    this.devicePoller = new DevicePoller(this.client, this.mapper, this.retryService, this.log);
    this.userPoller = new UserPoller(this.client, this.mapper, this.retryService, timezone, this.now, this.log);
  }

  get token(): string | null {
    return this.sessions.current?.token ?? null;
  }

  /** The logged-in account's user id. */
  get userId(): string | null {
    return this.sessions.current?.userId ?? null;
  }

  get deviceIds(): readonly string[] {
    return this.deviceIdList;
  }

  /** The first paired device. */
  get deviceId(): string | null {
    return this.deviceIdList[0] ?? null;
  }

  /** One view per tracked device side. A user on two beds appears twice. */
  get users(): readonly EightUser[] {
    return this.userList;
  }

  /** The user's view on `deviceId`, or on the first device they sleep on. */
  user(userId: string, deviceId?: string): EightUser | null {
    return this.userList.find(user => user.userId === userId && (deviceId === undefined || user.deviceId === deviceId)) ?? null;
  }

  private get userIds(): string[] {
    return [...new Set(this.userList.map(user => user.userId))];
  }

  /** Latest snapshot of every device that has been polled. */
  get devices(): ReadonlyMap<string, Device> {
    const latest = new Map<string, Device>();
    for (const [deviceId, history] of this.deviceHistory) {
      if (history.length > 0) {
        latest.set(deviceId, history[0]);
      }
    }
    return latest;
  }

  device(deviceId: string): Device | null {
    return this.deviceHistory.get(deviceId)?.[0] ?? null;
  }

  /** Latest snapshot of the first device. */
  get deviceData(): Device | null {
    return this.deviceId === null ? null : this.device(this.deviceId);
  }

  /** Most recent readings first, at most ten. */
  deviceDataHistory(deviceId?: string): readonly Device[] {
    const id = deviceId ?? this.deviceId;
    return id === null ? [] : this.deviceHistory.get(id) ?? [];
  }

  userData(userId: string): UserSnapshot | null {
    return this.userSnapshots.get(userId) ?? null;
  }

  userProfile(userId: string): UserProfile | null {
    return this.userProfiles.get(userId) ?? null;
  }

  fetchUserId(side: BedSide, deviceId?: string): string | null {
    const id = deviceId ?? this.deviceId;
    return this.userList.find(user => user.side === side && user.deviceId === id)?.userId ?? null;
  }

  /** Mean of the users' latest room temperature readings, in °C. */
  get roomTemperature(): number | null {
    const readings = this.userIds
      .map(userId => this.user(userId)?.currentRoomTemp ?? null)
      .filter((temp): temp is number => temp !== null);
    if (readings.length === 0) {
      return null;
    }
    return readings.reduce((sum, temp) => sum + temp, 0) / readings.length;
  }

  /**
   * Logs in, discovers the account's devices and assigns users to bed sides.
   * A failed discovery drops the session, so nothing can poll until a start succeeds.
   */
  async start(): Promise<void> {
    const session = await this.sessions.login();
    try {
      await this.discover(session.userId);
    } catch (error) {
      this.sessions.invalidate();
      throw error;
    }
  }

  private async discover(accountUserId: string): Promise<void> {
    const me = await this.retryService.retryOnExpiredSession(async token => {
      const response = await this.client.getMe(token);
      return this.mapper.toUserProfile(response.data);
    }, 'fetch account profile');

    const assignments: UserAssignment[] = [];
    for (const deviceId of me.devices) {
      const deviceUsers = await this.retryService.retryOnExpiredSession(async token => {
        const response = await this.client.getDeviceUsers(token, deviceId);
        return this.mapper.toDeviceUsers(response.data);
      }, `fetch users of device ${deviceId}`);
      assignments.push(...this.assignSides(deviceId, accountUserId, deviceUsers.leftUserId, deviceUsers.rightUserId));
    }

    const profiles = new Map<string, UserProfile>([[me.userId, me]]);
    for (const {userId} of assignments) {
      if (!profiles.has(userId)) {
        const profile = await this.retryService.retryOnExpiredSession(async token => {
          const response = await this.client.getUserProfile(token, userId);
          return this.mapper.toUserProfile(response.data);
        }, `fetch profile of ${userId}`);
        profiles.set(userId, profile);
      }
    }

    this.deviceIdList = [...me.devices];
    this.userProfiles.clear();
    for (const [userId, profile] of profiles) {
      this.userProfiles.set(userId, profile);
    }
    this.userList = assignments.map(({userId, deviceId, side}) =>
      new EightUser(this, userId, deviceId, side, this.now, this.log));
    this.log?.info(`Found ${this.deviceIdList.length} device(s) and ${this.userIds.length} user(s)`);
  }

  private assignSides(
    deviceId: string,
    accountUserId: string,
    leftUserId: string | null,
    rightUserId: string | null,
  ): UserAssignment[] {
    const sides: Array<[BedSide, string | null]> = [['left', leftUserId], ['right', rightUserId]];
    const ownSide = sides.find(([, userId]) => userId === accountUserId)?.[0]
      ?? (leftUserId !== null ? 'left' : null);

    const assignments: UserAssignment[] = [];
    for (const [side, userId] of sides) {
      if (userId !== null && (side === ownSide || this.partner)) {
        assignments.push({userId, deviceId, side});
      }
    }
    return assignments;
  }

  /**
   * Drops the session. An externally supplied HTTP client is left untouched.
   */
  async stop(): Promise<void> {
    this.sessions.invalidate();
    this.log?.debug('Session closed');
  }

  /**
   * Polls every device. All readings are committed together, then bed
   * presence is recomputed for every user.
   */
  async updateDeviceData(): Promise<void> {
    await this.sessions.ensureValid();
    const devices = await this.devicePoller.fetch(this.deviceIdList);
    for (const device of devices.values()) {
      this.pushReading(device.id, device);
    }
    for (const user of this.userList) {
      user.dynamicPresence();
    }
  }

  async updateUserData(): Promise<void> {
    await this.sessions.ensureValid();
    const snapshots = await this.userPoller.fetch(this.userIds);
    for (const [userId, snapshot] of snapshots) {
      this.userSnapshots.set(userId, snapshot);
    }
  }

  /**
   * Sets the target heating level (clamped to 10..100) of a user's side for
   * `durationSeconds`. `deviceId` picks the bed when the user sleeps on several.
   * The device state the API returns becomes the latest reading.
   */
  async setHeatingLevel(userId: string, level: number, durationSeconds = 0, deviceId?: string): Promise<Device> {
    const user = this.user(userId, deviceId);
    if (user === null) {
      throw new EightSleepError(`Unknown user ${userId}${deviceId === undefined ? '' : ` on device ${deviceId}`}`);
    }
    return this.setSideHeatingLevel(user.deviceId, user.side, level, durationSeconds);
  }

  async setSideHeatingLevel(deviceId: string, side: BedSide, level: number, durationSeconds: number): Promise<Device> {
    if (!Number.isFinite(level)) {
      throw new EightSleepError(`Heating level must be a finite number, got ${level}`);
    }
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      throw new EightSleepError(`Heating duration must be a non-negative number of seconds, got ${durationSeconds}`);
    }
    const clamped = Math.min(HEATING_LEVEL_MAX, Math.max(HEATING_LEVEL_MIN, Math.round(level)));
    const update = side === 'left'
      ? {leftHeatingDuration: durationSeconds, leftTargetHeatingLevel: clamped}
      : {rightHeatingDuration: durationSeconds, rightTargetHeatingLevel: clamped};

    const device = await this.retryService.retryOnExpiredSession(async token => {
      const response = await this.client.setHeatingLevel(token, deviceId, update);
      return this.mapper.toHeatingResponse(response.data);
    }, `set ${side} heating level of ${deviceId}`);

    this.log?.info(`${side} side of ${deviceId}: target heating level ${clamped} for ${durationSeconds}s`);
    this.pushReading(deviceId, device);
    return device;
  }

  private pushReading(deviceId: string, device: Device): void {
    const history = [device, ...(this.deviceHistory.get(deviceId) ?? [])];
    this.deviceHistory.set(deviceId, history.slice(0, DEVICE_HISTORY_LENGTH));
  }
}
