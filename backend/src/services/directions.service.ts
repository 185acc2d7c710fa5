import { z } from 'zod';
import { RouteSummary } from '../models/environment.model';
import { AdapterResult, succeed } from './adapter-result';
import { GoogleApiService, QueryParams } from './google-api.service';

export const TRAVEL_MODES = ['driving', 'walking', 'bicycling', 'transit'] as const;
export type TravelMode = (typeof TRAVEL_MODES)[number];

const measureSchema = z.object({ text: z.string(), value: z.number() });

const directionsResponseSchema = z.object({
  routes: z.array(
    z.object({
      summary: z.string().default(''),
      warnings: z.array(z.string()).default([]),
      legs: z.array(
        z.object({
          start_address: z.string(),
          end_address: z.string(),
          distance: measureSchema,
          duration: measureSchema
        })
      )
    })
  )
});

export interface DirectionsParams {
  origin: string;
  destination: string;
  mode?: TravelMode;
  waypoints?: string[];
}

export class DirectionsService extends GoogleApiService {
  protected readonly service = 'directions' as const;

  async getDirections({
    origin,
    destination,
    mode = 'driving',
    waypoints
  }: DirectionsParams): Promise<AdapterResult<RouteSummary[]>> {
    const params: QueryParams = { origin, destination, mode };
    if (waypoints && waypoints.length > 0) {
      params.waypoints = waypoints.join('|');
    }

    const result = await this.request('directions/json', params, directionsResponseSchema);
    if (!result.ok) return result;

    return succeed(
      result.data.routes.map((route) => {
        const legs = route.legs.map((leg) => ({
          startAddress: leg.start_address,
          endAddress: leg.end_address,
          distanceMeters: leg.distance.value,
          durationSeconds: leg.duration.value,
          distanceText: leg.distance.text,
          durationText: leg.duration.text
        }));
        return {
          summary: route.summary,
          distanceMeters: legs.reduce((total, leg) => total + leg.distanceMeters, 0),
          durationSeconds: legs.reduce((total, leg) => total + leg.durationSeconds, 0),
          legs,
          warnings: route.warnings
        };
      })
    );
  }
}
