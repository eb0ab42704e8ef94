export {EightSleep} from './eightSleep.js';
export {EightUser} from './eightUser.js';
export type {UserDataSource} from './eightUser.js';
export {Client} from './eightsleep/client.js';
export type {ClientOptions, ClientResponse, HeatingLevelUpdate} from './eightsleep/client.js';
export {
  AuthError,
  EightSleepError,
  FetchError,
  MalformedResponseError,
  TokenExpiredError,
} from './eightsleep/errors.js';
export {PollingService} from './services/polling.js';
export type {Pollable, PollingConfig} from './services/polling.js';
export * from './types/index.js';
export type * from './types/models.js';
export type {CompactDevicePayload, DevicePayload, SleepInterval, SleepStage, TrendDay} from './utils/mapper.js';
