import { z } from 'zod';
import { GeocodedLocation } from '../models/environment.model';
import { AdapterResult, fail, succeed } from './adapter-result';
import { GoogleApiService, latLngSchema } from './google-api.service';

const geocodeResponseSchema = z.object({
  results: z.array(
    z.object({
      formatted_address: z.string(),
      place_id: z.string(),
      geometry: z.object({ location: latLngSchema }),
      address_components: z
        .array(
          z.object({
            long_name: z.string(),
            short_name: z.string(),
            types: z.array(z.string())
          })
        )
        .default([])
    })
  )
});

type GeocodeResponse = z.infer<typeof geocodeResponseSchema>;

const toLocation = (result: GeocodeResponse['results'][number]): GeocodedLocation => {
  const country = result.address_components.find((component) => component.types.includes('country'));
  return {
    formattedAddress: result.formatted_address,
    location: result.geometry.location,
    placeId: result.place_id,
    ...(country ? { country: country.long_name } : {})
  };
};

export class GeocodingService extends GoogleApiService {
  protected readonly service = 'geocoding' as const;

  async getCoordinates(address: string): Promise<AdapterResult<GeocodedLocation>> {
    const result = await this.request('geocode/json', { address }, geocodeResponseSchema);
    if (!result.ok) return result;

    const [first] = result.data.results;
    if (!first) {
      return fail(this.service, 'not_found', `No match for "${address}"`);
    }
    return succeed(toLocation(first));
  }
}
