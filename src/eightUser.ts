import {ClientLogger, DEVICE_HISTORY_LENGTH, STALE_PRESENCE_SECONDS} from './types/index.js';
import type {BedSide} from './types/index.js';
import type {
  CurrentSessionValues,
  Device,
  HeatingValues,
  SessionValues,
  SideState,
  SleepBreakdown,
  UserProfile,
  UserSnapshot,
} from './types/models.js';
import type {SleepInterval, TimeseriesPoint, TrendDay} from './utils/mapper.js';
import {Option} from './utils/option.js';

/**
 * What a user reads from the client that tracks it.
 */
export interface UserDataSource {
  deviceDataHistory(deviceId: string): readonly Device[];
  userData(userId: string): UserSnapshot | null;
  userProfile(userId: string): UserProfile | null;
  setSideHeatingLevel(deviceId: string, side: BedSide, level: number, durationSeconds: number): Promise<Device>;
}

type KnownKeys<T> = keyof {[K in keyof T as string extends K ? never : K]: T[K]};
type SeriesName = KnownKeys<NonNullable<SleepInterval['timeseries']>>;

function lastValue(series: TimeseriesPoint[] | undefined): number | null {
  if (!series || series.length === 0) {
    return null;
  }
  return series[series.length - 1][1];
}

function averageValue(series: TimeseriesPoint[] | undefined): number | null {
  if (!series || series.length === 0) {
    return null;
  }
  return series.reduce((sum, point) => sum + point[1], 0) / series.length;
}

function breakdown(interval: SleepInterval | null): SleepBreakdown | null {
  return new Option(interval?.stages)
    .map(stages => stages.reduce<SleepBreakdown>((totals, stage) => {
      if (stage.stage === 'awake' || stage.stage === 'light' || stage.stage === 'deep' || stage.stage === 'rem') {
        totals[stage.stage] += stage.duration;
      }
      return totals;
    }, {awake: 0, light: 0, deep: 0, rem: 0}))
    .value;
}

function sessionDate(interval: SleepInterval | null): Date | null {
  return new Option(interval?.ts)
    .map(ts => new Date(ts))
    .map(date => Number.isNaN(date.getTime()) ? null : date)
    .value;
}

/**
 * One sleeper on one side of a bed. Device readings come from the latest
 * device poll, sleep data from the latest user poll.
 */
export class EightUser {
  private presence = false;

  constructor(
    private readonly source: UserDataSource,
    readonly userId: string,
    readonly deviceId: string,
    readonly side: BedSide,
    private readonly now: () => number,
    private readonly log?: ClientLogger,
  ) {}

  get profile(): UserProfile | null {
    return this.source.userProfile(this.userId);
  }

  get intervals(): SleepInterval[] {
    return this.source.userData(this.userId)?.intervals ?? [];
  }

  get trends(): TrendDay[] {
    return this.source.userData(this.userId)?.trends ?? [];
  }

  private sideState(index = 0): SideState | null {
    const device = this.source.deviceDataHistory(this.deviceId)[index];
    if (device === undefined) {
      return null;
    }
    return this.side === 'left' ? device.left : device.right;
  }

  private interval(index: number): SleepInterval | null {
    return this.intervals[index] ?? null;
  }

  get bedPresence(): boolean {
    return this.presence;
  }

  get heatingLevel(): number | null {
    return new Option(this.sideState()).map(s => s.heatingLevel).value;
  }

  get targetHeatingLevel(): number | null {
    return new Option(this.sideState()).map(s => s.targetHeatingLevel).value;
  }

  get nowHeating(): boolean | null {
    return new Option(this.sideState()).map(s => s.nowHeating).value;
  }

  /** Seconds of heating left. */
  get heatingRemaining(): number | null {
    return new Option(this.sideState()).map(s => s.heatingDuration).value;
  }

  /** When the bed last saw someone on this side. */
  get lastSeen(): Date | null {
    return new Option(this.sideState()).map(s => s.presenceEnd).value;
  }

  get heatingValues(): HeatingValues {
    return {
      level: this.heatingLevel,
      target: this.targetHeatingLevel,
      active: this.nowHeating,
      remaining: this.heatingRemaining,
      lastSeen: this.lastSeen,
    };
  }

  /**
   * Heating level `num` readings ago (0 is the latest). Missing readings read as 0.
   */
  pastHeatingLevel(num: number): number {
    if (num < 0 || num >= DEVICE_HISTORY_LENGTH) {
      return 0;
    }
    return new Option(this.sideState(num)).map(s => s.heatingLevel).orElse(0);
  }

  get currentSessionDate(): Date | null {
    return sessionDate(this.interval(0));
  }

  get currentSessionProcessing(): boolean {
    return this.interval(0)?.incomplete ?? false;
  }

  get currentSleepStage(): string | null {
    const stages = this.interval(0)?.stages;
    if (!stages || stages.length === 0) {
      return null;
    }

    // While processing the API appends a trailing awake stage; the real one is second to last.
    const index = this.currentSessionProcessing && stages.length > 1 ? stages.length - 2 : stages.length - 1;
    const stage = stages[index].stage;

    const lastSeen = this.lastSeen;
    if (stage !== 'awake' && lastSeen !== null && (this.now() - lastSeen.getTime()) / 1000 > STALE_PRESENCE_SECONDS) {
      return 'awake';
    }
    return stage;
  }

  get currentSleepScore(): number | null {
    return this.interval(0)?.score ?? null;
  }

  get currentSleepBreakdown(): SleepBreakdown | null {
    return breakdown(this.interval(0));
  }

  private currentSeries(name: SeriesName): number | null {
    return lastValue(this.interval(0)?.timeseries?.[name]);
  }

  get currentBedTemp(): number | null {
    return this.currentSeries('tempBedC');
  }

  get currentRoomTemp(): number | null {
    return this.currentSeries('tempRoomC');
  }

  /** Toss and turns. */
  get currentTnt(): number | null {
    return new Option(this.interval(0)?.timeseries?.tnt).map(points => points.length).value;
  }

  get currentRespRate(): number | null {
    return this.currentSeries('respiratoryRate');
  }

  get currentHeartRate(): number | null {
    return this.currentSeries('heartRate');
  }

  get currentValues(): CurrentSessionValues {
    return {
      date: this.currentSessionDate,
      score: this.currentSleepScore,
      stage: this.currentSleepStage,
      breakdown: this.currentSleepBreakdown,
      tnt: this.currentTnt,
      bedTemp: this.currentBedTemp,
      roomTemp: this.currentRoomTemp,
      respRate: this.currentRespRate,
      heartRate: this.currentHeartRate,
      processing: this.currentSessionProcessing,
    };
  }

  get lastSessionDate(): Date | null {
    return sessionDate(this.interval(1));
  }

  get lastSessionProcessing(): boolean {
    return this.interval(1)?.incomplete ?? false;
  }

  get lastSleepScore(): number | null {
    return this.interval(1)?.score ?? null;
  }

  get lastSleepBreakdown(): SleepBreakdown | null {
    return breakdown(this.interval(1));
  }

  private lastSessionAverage(name: SeriesName): number | null {
    return averageValue(this.interval(1)?.timeseries?.[name]);
  }

  get lastBedTemp(): number | null {
    return this.lastSessionAverage('tempBedC');
  }

  get lastRoomTemp(): number | null {
    return this.lastSessionAverage('tempRoomC');
  }

  get lastTnt(): number | null {
    return new Option(this.interval(1)?.timeseries?.tnt).map(points => points.length).value;
  }

  get lastRespRate(): number | null {
    return this.lastSessionAverage('respiratoryRate');
  }

  get lastHeartRate(): number | null {
    return this.lastSessionAverage('heartRate');
  }

  get lastValues(): SessionValues {
    return {
      date: this.lastSessionDate,
      score: this.lastSleepScore,
      breakdown: this.lastSleepBreakdown,
      tnt: this.lastTnt,
      bedTemp: this.lastBedTemp,
      roomTemp: this.lastRoomTemp,
      respRate: this.lastRespRate,
      heartRate: this.lastHeartRate,
      processing: this.lastSessionProcessing,
    };
  }

  private trendDay(day: string): TrendDay | null {
    return this.trends.find(trend => trend.day === day) ?? null;
  }

  /** Sleep score for a YYYY-MM-DD day from the trends window. */
  trendSleepScore(day: string): number | null {
    return new Option(this.trendDay(day)).map(trend => trend.score).value;
  }

  sleepFitnessScore(day: string): number | null {
    return new Option(this.trendDay(day)).map(trend => trend.sleepFitnessScore?.total).value;
  }

  async setHeatingLevel(level: number, durationSeconds = 0): Promise<Device> {
    return this.source.setSideHeatingLevel(this.deviceId, this.side, level, durationSeconds);
  }

  /**
   * Infers bed presence from the heating level history: the mattress warms
   * when someone lies on it and cools when they leave.
   */
  dynamicPresence(): void {
    const level = this.heatingLevel;
    if (level === null) {
      return;
    }
    const target = this.targetHeatingLevel ?? 0;
    const heating = this.nowHeating ?? false;
    const past = [0, 1, 2, 3].map(n => this.pastHeatingLevel(n));
    const risingEdge = past[0] - past[1] >= 2 && past[1] - past[2] >= 2 && past[2] - past[3] >= 2;
    const fallingEdge = past[0] - past[1] < 0 && past[1] - past[2] < 0 && past[2] - past[3] < 0;
    // Above target by this much while heating means body heat, not the heater.
    const overshoot = level - target >= 8;

    if (!this.presence) {
      if (level > 50) {
        this.presence = !heating || overshoot;
      } else if (level > 25 && risingEdge) {
        this.presence = !heating || overshoot;
      }
    } else if (level <= 15) {
      this.presence = false;
    } else if (level < 50 && fallingEdge) {
      this.presence = false;
    }

    this.log?.debug(`${this.side} presence results: ${this.presence}`);
  }
}
