import {z} from 'zod';
import {MalformedResponseError} from '../eightsleep/errors.js';
import type {BedSide} from '../types/index.js';
import type {Device, DeviceUsers, SensorState, Session, SideState, UserProfile} from '../types/models.js';

// Unix seconds, sometimes sent as a string
const epochSeconds = z.union([z.number(), z.string()]);

const sessionEnvelopeSchema = z.object({
  session: z.object({
    userId: z.string(),
    token: z.string(),
    expirationDate: z.string(),
  }),
});

const flatSessionSchema = z.object({
  userId: z.string(),
  token: z.string(),
  expiresIn: z.number(),
});

const devicePayloadSchema = z.object({
  deviceId: z.string(),
  ownerId: z.string().optional(),
  leftUserId: z.string().optional(),
  rightUserId: z.string().optional(),
  leftHeatingLevel: z.number(),
  leftTargetHeatingLevel: z.number().optional(),
  leftNowHeating: z.boolean().optional(),
  leftHeatingDuration: z.number().optional(),
  leftPresenceStart: epochSeconds.optional(),
  leftPresenceEnd: epochSeconds.optional(),
  rightHeatingLevel: z.number(),
  rightTargetHeatingLevel: z.number().optional(),
  rightNowHeating: z.boolean().optional(),
  rightHeatingDuration: z.number().optional(),
  rightPresenceStart: epochSeconds.optional(),
  rightPresenceEnd: epochSeconds.optional(),
  sensorInfo: z.object({
    connected: z.boolean().optional(),
    serialNumber: z.string().optional(),
    lastConnected: z.string().optional(),
  }).passthrough().optional(),
  hasWater: z.boolean().optional(),
  priming: z.boolean().optional(),
  needsPriming: z.boolean().optional(),
  lastHeard: z.string().optional(),
}).passthrough();

// Summary form with one presence flag for the whole bed
const compactDevicePayloadSchema = z.object({
  id: z.string(),
  leftTemp: z.number(),
  rightTemp: z.number(),
  present: z.boolean().optional(),
}).passthrough();

// The device endpoint wraps the reading in `result`; some gateways return it bare.
const deviceResponseSchema = z.union([
  z.object({result: devicePayloadSchema}).transform(body => ({kind: 'full' as const, payload: body.result})),
  devicePayloadSchema.transform(payload => ({kind: 'full' as const, payload})),
  z.object({result: compactDevicePayloadSchema}).transform(body => ({kind: 'compact' as const, payload: body.result})),
  compactDevicePayloadSchema.transform(payload => ({kind: 'compact' as const, payload})),
]);

const heatingResponseSchema = z.object({device: devicePayloadSchema});

const deviceUsersSchema = z.object({
  result: z.object({
    ownerId: z.string().optional(),
    leftUserId: z.string().optional(),
    rightUserId: z.string().optional(),
  }),
});

const userProfileSchema = z.object({
  user: z.object({
    userId: z.string(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    devices: z.array(z.string()).default([]),
  }).passthrough(),
});

const timeseriesSchema = z.array(z.tuple([z.string(), z.number()]));

const sleepIntervalSchema = z.object({
  id: z.string().optional(),
  ts: z.string(),
  score: z.number().optional(),
  incomplete: z.boolean().optional(),
  stages: z.array(z.object({
    stage: z.string(),
    duration: z.number(),
  }).passthrough()).optional(),
  timeseries: z.object({
    tempBedC: timeseriesSchema.optional(),
    tempRoomC: timeseriesSchema.optional(),
    tnt: timeseriesSchema.optional(),
    respiratoryRate: timeseriesSchema.optional(),
    heartRate: timeseriesSchema.optional(),
  }).passthrough().optional(),
}).passthrough();

const intervalsResponseSchema = z.object({intervals: z.array(sleepIntervalSchema)});

const componentScoreSchema = z.object({score: z.number()}).passthrough();

const trendDaySchema = z.object({
  day: z.string(),
  score: z.number().optional(),
  sleepFitnessScore: z.object({
    total: z.number(),
    sleepDurationSeconds: componentScoreSchema.optional(),
    latencyAsleepSeconds: componentScoreSchema.optional(),
    latencyOutSeconds: componentScoreSchema.optional(),
    wakeupConsistency: componentScoreSchema.optional(),
  }).passthrough().optional(),
}).passthrough();

const trendsResponseSchema = z.object({days: z.array(trendDaySchema)});

export type DevicePayload = z.infer<typeof devicePayloadSchema>;
export type CompactDevicePayload = z.infer<typeof compactDevicePayloadSchema>;
export type SleepInterval = z.infer<typeof sleepIntervalSchema>;
export type SleepStage = NonNullable<SleepInterval['stages']>[number];
export type TimeseriesPoint = z.infer<typeof timeseriesSchema>[number];
export type TrendDay = z.infer<typeof trendDaySchema>;

/**
 * Interface for mapping raw API payloads to client snapshots. Every method
 * throws MalformedResponseError when the payload does not have the expected shape.
 */
export interface Mapper {
  toSession: (payload: unknown) => Session;
  toDevice: (payload: unknown) => Device;
  toHeatingResponse: (payload: unknown) => Device;
  toDeviceUsers: (payload: unknown) => DeviceUsers;
  toUserProfile: (payload: unknown) => UserProfile;
  toIntervals: (payload: unknown) => SleepInterval[];
  toTrends: (payload: unknown) => TrendDay[];
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  if (typeof payload === 'string') {
    throw new MalformedResponseError(`Response for ${what} was not JSON`);
  }
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(`Unexpected ${what} payload (${issues})`);
  }
  return result.data;
}

export function fromEpochSeconds(value: number | string | undefined): Date | null {
  if (value === undefined) {
    return null;
  }
  const seconds = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(seconds) ? new Date(seconds * 1000) : null;
}

function fromIsoString(value: string | undefined): Date | null {
  if (value === undefined) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toSideState(payload: DevicePayload, side: BedSide): SideState {
  const presenceStart = fromEpochSeconds(payload[`${side}PresenceStart` as const]);
  const presenceEnd = fromEpochSeconds(payload[`${side}PresenceEnd` as const]);
  return {
    heatingLevel: payload[`${side}HeatingLevel` as const],
    targetHeatingLevel: payload[`${side}TargetHeatingLevel` as const] ?? null,
    nowHeating: payload[`${side}NowHeating` as const] ?? null,
    heatingDuration: payload[`${side}HeatingDuration` as const] ?? null,
    presenceStart,
    presenceEnd,
    present: presenceStart !== null && (presenceEnd === null || presenceStart > presenceEnd),
  };
}

function toCompactSideState(heatingLevel: number, present: boolean): SideState {
  return {
    heatingLevel,
    targetHeatingLevel: null,
    nowHeating: null,
    heatingDuration: null,
    presenceStart: null,
    presenceEnd: null,
    present,
  };
}

function toSensorState(payload: DevicePayload): SensorState {
  const sensor = payload.sensorInfo;
  return {
    connected: sensor?.connected ?? null,
    serialNumber: sensor?.serialNumber ?? null,
    lastConnected: fromIsoString(sensor?.lastConnected),
  };
}

/**
 * Creates a new mapper for converting Eight Sleep payloads to snapshots
 */
export function newMapper(now: () => number = Date.now): Mapper {
  const toDeviceSnapshot = (payload: DevicePayload): Device => ({
    id: payload.deviceId,
    ownerId: payload.ownerId ?? null,
    leftUserId: payload.leftUserId ?? null,
    rightUserId: payload.rightUserId ?? null,
    left: toSideState(payload, 'left'),
    right: toSideState(payload, 'right'),
    sensor: toSensorState(payload),
    hasWater: payload.hasWater ?? null,
    priming: payload.priming ?? null,
    needsPriming: payload.needsPriming ?? null,
    lastHeard: fromIsoString(payload.lastHeard),
    fetchedAt: new Date(now()),
    raw: payload,
  });

  const toCompactDeviceSnapshot = (payload: CompactDevicePayload): Device => ({
    id: payload.id,
    ownerId: null,
    leftUserId: null,
    rightUserId: null,
    left: toCompactSideState(payload.leftTemp, payload.present ?? false),
    right: toCompactSideState(payload.rightTemp, payload.present ?? false),
    sensor: {connected: null, serialNumber: null, lastConnected: null},
    hasWater: null,
    priming: null,
    needsPriming: null,
    lastHeard: null,
    fetchedAt: new Date(now()),
    raw: payload,
  });

  return {
    toSession: (payload: unknown): Session => {
      if (typeof payload === 'object' && payload !== null && 'session' in payload) {
        const {session} = parse(sessionEnvelopeSchema, payload, 'login');
        const expiry = fromIsoString(session.expirationDate);
        if (expiry === null) {
          throw new MalformedResponseError(`Unexpected login payload (session.expirationDate: invalid date)`);
        }
        return {token: session.token, expiry, userId: session.userId};
      }
      const session = parse(flatSessionSchema, payload, 'login');
      return {
        token: session.token,
        expiry: new Date(now() + session.expiresIn * 1000),
        userId: session.userId,
      };
    },

    toDevice: (payload: unknown): Device => {
      const reading = parse(deviceResponseSchema, payload, 'device');
      return reading.kind === 'full' ? toDeviceSnapshot(reading.payload) : toCompactDeviceSnapshot(reading.payload);
    },

    toHeatingResponse: (payload: unknown): Device =>
      toDeviceSnapshot(parse(heatingResponseSchema, payload, 'heating level').device),

    toDeviceUsers: (payload: unknown): DeviceUsers => {
      const {result} = parse(deviceUsersSchema, payload, 'device users');
      return {
        ownerId: result.ownerId ?? null,
        leftUserId: result.leftUserId ?? null,
        rightUserId: result.rightUserId ?? null,
      };
    },

    toUserProfile: (payload: unknown): UserProfile => {
      const {user} = parse(userProfileSchema, payload, 'user profile');
      return {
        userId: user.userId,
        firstName: user.firstName ?? null,
        lastName: user.lastName ?? null,
        devices: user.devices,
      };
    },

    toIntervals: (payload: unknown): SleepInterval[] => parse(intervalsResponseSchema, payload, 'intervals').intervals,

    toTrends: (payload: unknown): TrendDay[] => parse(trendsResponseSchema, payload, 'trends').days,
  };
}
