import { z } from 'zod';
import { LatLng, PlaceSummary } from '../models/environment.model';
import { AdapterResult, succeed } from './adapter-result';
import { GoogleApiService, QueryParams, latLngSchema } from './google-api.service';

export const DEFAULT_NEARBY_RADIUS = 5000;
export const DEFAULT_TEXT_SEARCH_RADIUS = 50000;

const placesResponseSchema = z.object({
  results: z.array(
    z.object({
      place_id: z.string(),
      name: z.string(),
      vicinity: z.string().optional(),
      formatted_address: z.string().optional(),
      rating: z.number().optional(),
      geometry: z.object({ location: latLngSchema })
    })
  )
});

type PlacesResponse = z.infer<typeof placesResponseSchema>;

const toSummary = (place: PlacesResponse['results'][number]): PlaceSummary => ({
  placeId: place.place_id,
  name: place.name,
  address: place.formatted_address ?? place.vicinity ?? '',
  location: place.geometry.location,
  ...(place.rating !== undefined ? { rating: place.rating } : {})
});

export class PlacesService extends GoogleApiService {
  protected readonly service = 'places' as const;

  async searchNearby(
    { lat, lng }: LatLng,
    placeType: string,
    radius = DEFAULT_NEARBY_RADIUS
  ): Promise<AdapterResult<PlaceSummary[]>> {
    const result = await this.request(
      'place/nearbysearch/json',
      { location: `${lat},${lng}`, radius, type: placeType },
      placesResponseSchema
    );
    if (!result.ok) return result;
    return succeed(result.data.results.map(toSummary));
  }

  async textSearch(
    query: string,
    near?: LatLng,
    radius = DEFAULT_TEXT_SEARCH_RADIUS
  ): Promise<AdapterResult<PlaceSummary[]>> {
    const params: QueryParams = { query };
    if (near) {
      params.location = `${near.lat},${near.lng}`;
      params.radius = radius;
    }

    const result = await this.request('place/textsearch/json', params, placesResponseSchema);
    if (!result.ok) return result;
    return succeed(result.data.results.map(toSummary));
  }
}
