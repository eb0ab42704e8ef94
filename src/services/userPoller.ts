import {Client} from '../eightsleep/client.js';
import {ClientLogger, TREND_WINDOW_DAYS} from '../types/index.js';
import type {UserSnapshot} from '../types/models.js';
import {dayWindow} from '../utils/dates.js';
import {Mapper} from '../utils/mapper.js';
import {RetryService} from './retry.js';

/**
 * Fetches sleep intervals and trends for the tracked users
 */
export class UserPoller {
  constructor(
    private readonly client: Client,
    private readonly mapper: Mapper,
    private readonly retryService: RetryService,
    private readonly timezone: string,
    private readonly now: () => number,
    private readonly log?: ClientLogger,
  ) {}

  async fetch(userIds: readonly string[]): Promise<Map<string, UserSnapshot>> {
    const users = new Map<string, UserSnapshot>();
    const {from, to} = dayWindow(this.now(), this.timezone, TREND_WINDOW_DAYS);

    for (const userId of userIds) {
      const intervals = await this.retryService.retryOnExpiredSession(async token => {
        const response = await this.client.getIntervals(token, userId);
        return this.mapper.toIntervals(response.data);
      }, `fetch intervals for ${userId}`);

      const trends = await this.retryService.retryOnExpiredSession(async token => {
        const response = await this.client.getTrends(token, userId, this.timezone, from, to);
        return this.mapper.toTrends(response.data);
      }, `fetch trends for ${userId}`);

      this.log?.debug(`${userId}: ${intervals.length} intervals, ${trends.length} trend days (${from} to ${to})`);
      users.set(userId, {userId, intervals, trends, fetchedAt: new Date(this.now())});
    }

    return users;
  }
}
