import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {EightUser, UserDataSource} from '../src/eightUser.js';
import type {BedSide} from '../src/types/index.js';
import type {Device, UserProfile, UserSnapshot} from '../src/types/models.js';
import {newMapper} from '../src/utils/mapper.js';
import {clock, deviceReading, DeviceReading, INTERVALS, NOW, TRENDS} from './helpers/fixtures.js';

const mapper = newMapper(clock);

/**
 * Stand-in for the client: readings are pushed newest first, like the client does.
 */
class StubSource implements UserDataSource {
  history: Device[] = [];
  snapshot: UserSnapshot | null = null;
  heatingCalls: Array<[string, BedSide, number, number]> = [];

  push(overrides: DeviceReading): void {
    this.history = [mapper.toDevice(deviceReading(overrides)), ...this.history].slice(0, 10);
  }

  deviceDataHistory(): readonly Device[] {
    return this.history;
  }

  userData(): UserSnapshot | null {
    return this.snapshot;
  }

  userProfile(userId: string): UserProfile | null {
    return {userId, firstName: 'Alex', lastName: null, devices: ['d1']};
  }

  async setSideHeatingLevel(deviceId: string, side: BedSide, level: number, durationSeconds: number): Promise<Device> {
    this.heatingCalls.push([deviceId, side, level, durationSeconds]);
    return mapper.toDevice(deviceReading());
  }
}

function userOn(side: BedSide, now: () => number = clock): {user: EightUser; source: StubSource} {
  const source = new StubSource();
  return {user: new EightUser(source, side === 'left' ? 'u1' : 'u2', 'd1', side, now), source};
}

function withSleepData(source: StubSource): void {
  source.snapshot = {
    userId: 'u1',
    intervals: mapper.toIntervals(INTERVALS),
    trends: mapper.toTrends(TRENDS),
    fetchedAt: new Date(NOW),
  };
}

describe('EightUser', () => {
  describe('heating values', () => {
    it('reads its own side of the latest reading', () => {
      const {user, source} = userOn('right');
      source.push({rightHeatingLevel: -32, rightTargetHeatingLevel: 0, rightNowHeating: false, rightHeatingDuration: 0});

      assert.deepEqual(user.heatingValues, {
        level: -32,
        target: 0,
        active: false,
        remaining: 0,
        lastSeen: new Date(1711010000 * 1000),
      });
    });

    it('is empty before the first reading', () => {
      const {user} = userOn('left');
      assert.deepEqual(user.heatingValues, {level: null, target: null, active: null, remaining: null, lastSeen: null});
      assert.equal(user.pastHeatingLevel(0), 0);
    });

    it('looks back through past readings', () => {
      const {user, source} = userOn('left');
      source.push({leftHeatingLevel: 11});
      source.push({leftHeatingLevel: 22});

      assert.equal(user.pastHeatingLevel(0), 22);
      assert.equal(user.pastHeatingLevel(1), 11);
      assert.equal(user.pastHeatingLevel(2), 0);
      assert.equal(user.pastHeatingLevel(10), 0);
    });
  });

  describe('sleep sessions', () => {
    it('summarises the current session from its latest values', () => {
      const {user, source} = userOn('left');
      withSleepData(source);

      assert.deepEqual(user.currentValues, {
        date: new Date('2024-03-21T22:30:00.000Z'),
        score: 80,
        stage: 'awake',
        breakdown: {awake: 900, light: 3000, deep: 1800, rem: 1200},
        tnt: 3,
        bedTemp: 32,
        roomTemp: 21.5,
        respRate: 12,
        heartRate: 58,
        processing: false,
      });
    });

    it('summarises the last session from its averages', () => {
      const {user, source} = userOn('left');
      withSleepData(source);

      assert.deepEqual(user.lastValues, {
        date: new Date('2024-03-20T22:00:00.000Z'),
        score: 72,
        breakdown: {awake: 500, light: 4000, deep: 2000, rem: 0},
        tnt: 2,
        bedTemp: 31,
        roomTemp: 20,
        respRate: 14,
        heartRate: 64,
        processing: false,
      });
    });

    it('reports nothing without sleep data', () => {
      const {user} = userOn('left');

      assert.equal(user.currentSessionDate, null);
      assert.equal(user.currentSessionProcessing, false);
      assert.equal(user.currentSleepStage, null);
      assert.equal(user.currentSleepScore, null);
      assert.equal(user.currentSleepBreakdown, null);
      assert.equal(user.currentBedTemp, null);
      assert.equal(user.currentRoomTemp, null);
      assert.equal(user.currentTnt, null);
      assert.equal(user.currentRespRate, null);
      assert.equal(user.currentHeartRate, null);
      assert.equal(user.lastSleepScore, null);
      assert.equal(user.lastBedTemp, null);
    });

    it('skips the trailing awake stage while the session is processing', () => {
      const {user, source} = userOn('left');
      source.push({leftPresenceStart: 1711090000});
      source.snapshot = {
        userId: 'u1',
        intervals: mapper.toIntervals({intervals: [{
          ts: '2024-03-22T06:50:00.000Z',
          incomplete: true,
          stages: [{stage: 'light', duration: 600}, {stage: 'deep', duration: 900}, {stage: 'awake', duration: 60}],
        }]}),
        trends: [],
        fetchedAt: new Date(NOW),
      };

      assert.equal(user.currentSessionProcessing, true);
      assert.equal(user.currentSleepStage, 'deep');
    });

    it('reads as awake once the bed has not seen the user for half an hour', () => {
      const {user, source} = userOn('left');
      // Presence ended 40 minutes before now
      source.push({leftPresenceStart: 1711080000, leftPresenceEnd: NOW / 1000 - 2400});
      source.snapshot = {
        userId: 'u1',
        intervals: mapper.toIntervals({intervals: [{
          ts: '2024-03-22T03:00:00.000Z',
          stages: [{stage: 'light', duration: 600}, {stage: 'deep', duration: 900}],
        }]}),
        trends: [],
        fetchedAt: new Date(NOW),
      };

      assert.equal(user.currentSleepStage, 'awake');
    });

    it('looks up trend scores by day', () => {
      const {user, source} = userOn('left');
      withSleepData(source);

      assert.equal(user.trendSleepScore('2024-03-22'), 80);
      assert.equal(user.trendSleepScore('2020-03-22'), null);
      assert.equal(user.sleepFitnessScore('2024-03-21'), 65);
      assert.equal(user.sleepFitnessScore('2020-03-22'), null);
    });
  });

  describe('dynamicPresence', () => {
    it('detects someone lying on a bed that is not heating', () => {
      const {user, source} = userOn('left');
      source.push({leftHeatingLevel: 55, leftNowHeating: false});
      user.dynamicPresence();
      assert.equal(user.bedPresence, true);
    });

    it('ignores a warm bed that is heating towards its target', () => {
      const {user, source} = userOn('left');
      source.push({leftHeatingLevel: 55, leftTargetHeatingLevel: 60, leftNowHeating: true});
      user.dynamicPresence();
      assert.equal(user.bedPresence, false);
    });

    it('detects body heat above the heating target', () => {
      const {user, source} = userOn('left');
      source.push({leftHeatingLevel: 70, leftTargetHeatingLevel: 60, leftNowHeating: true});
      user.dynamicPresence();
      assert.equal(user.bedPresence, true);
    });

    it('catches a steadily rising level between 25 and 50', () => {
      const {user, source} = userOn('left');
      for (const level of [20, 23, 26, 29]) {
        source.push({leftHeatingLevel: level, leftNowHeating: false});
        user.dynamicPresence();
      }
      assert.equal(user.bedPresence, true);
    });

    it('does not react to a flat level between 25 and 50', () => {
      const {user, source} = userOn('left');
      for (const level of [30, 30, 31, 30]) {
        source.push({leftHeatingLevel: level, leftNowHeating: false});
        user.dynamicPresence();
      }
      assert.equal(user.bedPresence, false);
    });

    it('clears presence on a steadily falling level', () => {
      const {user, source} = userOn('left');
      for (const level of [60, 48, 45, 40, 36]) {
        source.push({leftHeatingLevel: level, leftNowHeating: false});
        user.dynamicPresence();
      }
      assert.equal(user.bedPresence, false);
    });

    it('holds presence while the level stays high', () => {
      const {user, source} = userOn('left');
      for (const level of [60, 58, 59, 57]) {
        source.push({leftHeatingLevel: level, leftNowHeating: false});
        user.dynamicPresence();
      }
      assert.equal(user.bedPresence, true);
    });

    it('clears presence once the bed is cold', () => {
      const {user, source} = userOn('left');
      source.push({leftHeatingLevel: 60, leftNowHeating: false});
      user.dynamicPresence();
      source.push({leftHeatingLevel: 15, leftNowHeating: false});
      user.dynamicPresence();
      assert.equal(user.bedPresence, false);
    });
  });

  it('forwards heating changes for its own device side', async () => {
    const {user, source} = userOn('right');
    await user.setHeatingLevel(35, 900);
    await user.setHeatingLevel(40);
    assert.deepEqual(source.heatingCalls, [['d1', 'right', 35, 900], ['d1', 'right', 40, 0]]);
  });

  it('reads its profile from the client', () => {
    const {user} = userOn('left');
    assert.equal(user.profile?.firstName, 'Alex');
  });
});
