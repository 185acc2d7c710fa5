import { z } from 'zod';
import { LatLng, TimezoneInfo } from '../models/environment.model';
import { AdapterResult, succeed } from './adapter-result';
import { GoogleApiService } from './google-api.service';

const timezoneResponseSchema = z.object({
  timeZoneId: z.string(),
  timeZoneName: z.string(),
  rawOffset: z.number(),
  dstOffset: z.number()
});

export class TimezoneService extends GoogleApiService {
  protected readonly service = 'timezone' as const;

  /**
   * @param timestamp seconds since the epoch; DST offsets are resolved for
   * this instant. Defaults to now.
   */
  async getTimezone({ lat, lng }: LatLng, timestamp = Math.floor(Date.now() / 1000)): Promise<AdapterResult<TimezoneInfo>> {
    const result = await this.request(
      'timezone/json',
      { location: `${lat},${lng}`, timestamp },
      timezoneResponseSchema
    );
    if (!result.ok) return result;

    const { timeZoneId, timeZoneName, rawOffset, dstOffset } = result.data;
    return succeed({ timeZoneId, timeZoneName, rawOffset, dstOffset });
  }
}
