import {Client} from '../eightsleep/client.js';
import {ClientLogger} from '../types/index.js';
import type {Device} from '../types/models.js';
import {Mapper} from '../utils/mapper.js';
import {RetryService} from './retry.js';

/**
 * Fetches and decodes telemetry for the paired devices
 */
export class DevicePoller {
  constructor(
    private readonly client: Client,
    private readonly mapper: Mapper,
    private readonly retryService: RetryService,
    private readonly log?: ClientLogger,
  ) {}

  /**
   * Polls every device in order. Any failure aborts the whole poll, so the
   * caller either gets a reading for every device or none.
   */
  async fetch(deviceIds: readonly string[]): Promise<Map<string, Device>> {
    const devices = new Map<string, Device>();

    for (const deviceId of deviceIds) {
      const device = await this.retryService.retryOnExpiredSession(async token => {
        const response = await this.client.getDeviceData(token, deviceId);
        return this.mapper.toDevice(response.data);
      }, `fetch device data for ${deviceId}`);

      this.log?.debug(`${deviceId}: left ${device.left.heatingLevel}, right ${device.right.heatingLevel}`);
      devices.set(deviceId, device);
    }

    return devices;
  }
}
