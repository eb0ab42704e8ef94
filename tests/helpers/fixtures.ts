import {FakeEightApi} from './fakeApi.js';

// 2024-03-22T08:00:00Z
export const NOW = Date.parse('2024-03-22T08:00:00.000Z');
export const clock = (): number => NOW;

export const EMAIL = 'alex@example.com';
export const PASSWORD = 'test-password';

export const LOGIN = {
  session: {
    userId: 'u1',
    token: 'test-token',
    expirationDate: '2024-03-23T08:00:00.000Z',
  },
};

export const REFRESHED_LOGIN = {
  session: {
    userId: 'u1',
    token: 'test-token-2',
    expirationDate: '2024-03-23T09:00:00.000Z',
  },
};

export const ME = {
  user: {
    userId: 'u1',
    firstName: 'Alex',
    lastName: 'Doe',
    devices: ['d1'],
  },
};

export const PARTNER = {
  user: {
    userId: 'u2',
    firstName: 'Sam',
    devices: ['d1'],
  },
};

export const DEVICE_USERS = {
  result: {
    ownerId: 'u1',
    leftUserId: 'u1',
    rightUserId: 'u2',
  },
};

export type DeviceReading = Record<string, unknown>;

export function deviceReading(overrides: DeviceReading = {}): DeviceReading {
  return {
    deviceId: 'd1',
    ownerId: 'u1',
    leftUserId: 'u1',
    rightUserId: 'u2',
    leftHeatingLevel: 10,
    leftTargetHeatingLevel: 20,
    leftNowHeating: false,
    leftHeatingDuration: 0,
    leftPresenceStart: 1711090000,
    rightHeatingLevel: -5,
    rightTargetHeatingLevel: 0,
    rightNowHeating: false,
    rightHeatingDuration: 0,
    rightPresenceStart: 1711000000,
    rightPresenceEnd: 1711010000,
    sensorInfo: {
      connected: true,
      serialNumber: 'SN-0001',
      lastConnected: '2024-03-22T07:59:00.000Z',
    },
    hasWater: true,
    priming: false,
    needsPriming: false,
    lastHeard: '2024-03-22T07:59:30.000Z',
    ...overrides,
  };
}

export const INTERVALS = {
  intervals: [
    {
      id: 's2',
      ts: '2024-03-21T22:30:00.000Z',
      score: 80,
      incomplete: false,
      stages: [
        {stage: 'awake', duration: 600},
        {stage: 'light', duration: 3000},
        {stage: 'deep', duration: 1800},
        {stage: 'rem', duration: 1200},
        {stage: 'awake', duration: 300},
      ],
      timeseries: {
        tempBedC: [['2024-03-21T23:00:00.000Z', 30], ['2024-03-22T01:00:00.000Z', 32]],
        tempRoomC: [['2024-03-21T23:00:00.000Z', 20], ['2024-03-22T01:00:00.000Z', 21.5]],
        tnt: [['2024-03-21T23:10:00.000Z', 1], ['2024-03-22T00:40:00.000Z', 1], ['2024-03-22T03:05:00.000Z', 1]],
        respiratoryRate: [['2024-03-21T23:00:00.000Z', 14], ['2024-03-22T01:00:00.000Z', 12]],
        heartRate: [['2024-03-21T23:00:00.000Z', 60], ['2024-03-22T01:00:00.000Z', 58]],
      },
    },
    {
      id: 's1',
      ts: '2024-03-20T22:00:00.000Z',
      score: 72,
      stages: [
        {stage: 'light', duration: 4000},
        {stage: 'deep', duration: 2000},
        {stage: 'awake', duration: 500},
      ],
      timeseries: {
        tempBedC: [['2024-03-20T23:00:00.000Z', 30], ['2024-03-21T01:00:00.000Z', 31], ['2024-03-21T03:00:00.000Z', 32]],
        tempRoomC: [['2024-03-20T23:00:00.000Z', 19], ['2024-03-21T01:00:00.000Z', 21]],
        tnt: [['2024-03-20T23:30:00.000Z', 1], ['2024-03-21T02:00:00.000Z', 1]],
        respiratoryRate: [['2024-03-20T23:00:00.000Z', 13], ['2024-03-21T01:00:00.000Z', 15]],
        heartRate: [['2024-03-20T23:00:00.000Z', 62], ['2024-03-21T01:00:00.000Z', 66], ['2024-03-21T03:00:00.000Z', 64]],
      },
    },
  ],
};

export const TRENDS = {
  days: [
    {day: '2024-03-21', score: 72, sleepFitnessScore: {total: 65, sleepDurationSeconds: {score: 70}}},
    {day: '2024-03-22', score: 80, sleepFitnessScore: {total: 77}},
  ],
};

/**
 * A fake API that serves a one-device account with users u1 (left) and u2 (right).
 */
export function accountApi(): FakeEightApi {
  return new FakeEightApi()
    .on('POST', '/login', {status: 200, body: LOGIN})
    .on('GET', '/users/me', {status: 200, body: ME})
    .on('GET', '/users/u2', {status: 200, body: PARTNER})
    .on('GET', '/devices/d1', request => request.params.filter !== undefined
      ? {status: 200, body: DEVICE_USERS}
      : {status: 200, body: {result: deviceReading()}})
    .on('GET', '/users/u1/intervals', {status: 200, body: INTERVALS})
    .on('GET', '/users/u2/intervals', {status: 200, body: INTERVALS})
    .on('GET', '/users/u1/trends', {status: 200, body: TRENDS})
    .on('GET', '/users/u2/trends', {status: 200, body: TRENDS});
}
