import type {BedSide} from './index.js';
import type {CompactDevicePayload, DevicePayload, SleepInterval, TrendDay} from '../utils/mapper.js';

export type Session = {
  token: string;
  expiry: Date;
  userId: string;
};

export type SideState = {
  heatingLevel: number;
  targetHeatingLevel: number | null;
  nowHeating: boolean | null;
  /** Seconds of heating left. */
  heatingDuration: number | null;
  presenceStart: Date | null;
  presenceEnd: Date | null;
  /** True while the bed reports an open presence window on this side. */
  present: boolean;
};

export type SensorState = {
  connected: boolean | null;
  serialNumber: string | null;
  lastConnected: Date | null;
};

export type Device = {
  id: string;
  ownerId: string | null;
  leftUserId: string | null;
  rightUserId: string | null;
  left: SideState;
  right: SideState;
  sensor: SensorState;
  hasWater: boolean | null;
  priming: boolean | null;
  needsPriming: boolean | null;
  lastHeard: Date | null;
  fetchedAt: Date;
  /** The payload exactly as the API returned it. */
  raw: DevicePayload | CompactDevicePayload;
};

export type DeviceUsers = {
  ownerId: string | null;
  leftUserId: string | null;
  rightUserId: string | null;
};

export type UserProfile = {
  userId: string;
  firstName: string | null;
  lastName: string | null;
  devices: string[];
};

export type UserSnapshot = {
  userId: string;
  intervals: SleepInterval[];
  trends: TrendDay[];
  fetchedAt: Date;
};

export type UserAssignment = {
  userId: string;
  deviceId: string;
  side: BedSide;
};

export type SleepBreakdown = {
  awake: number;
  light: number;
  deep: number;
  rem: number;
};

export type HeatingValues = {
  level: number | null;
  target: number | null;
  active: boolean | null;
  remaining: number | null;
  lastSeen: Date | null;
};

export type SessionValues = {
  date: Date | null;
  score: number | null;
  breakdown: SleepBreakdown | null;
  tnt: number | null;
  bedTemp: number | null;
  roomTemp: number | null;
  respRate: number | null;
  heartRate: number | null;
  processing: boolean;
};

export type CurrentSessionValues = SessionValues & {
  stage: string | null;
};
