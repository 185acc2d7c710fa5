import { describe, it, expect } from 'vitest';
import { createFakeHttp, ok, routeByUrl } from '../test-support/fake-http';
import { TEST_KEY, geocodePayload, placesPayload, timezonePayload } from '../test-support/fixtures';
import { DirectionsService } from './directions.service';
import { GeocodingService } from './geocoding.service';
import { PlacesService } from './places.service';
import { StaticMapService } from './static-map.service';
import { TimezoneService } from './timezone.service';

describe('GeocodingService', () => {
  it('returns the first match with its country', async () => {
    const { http, requests } = createFakeHttp(() => ok(geocodePayload('Paris, France', 48.8566, 2.3522, 'France')));
    const service = new GeocodingService(TEST_KEY, http);

    const result = await service.getCoordinates('Paris');

    expect(result).toEqual({
      ok: true,
      data: {
        formattedAddress: 'Paris, France',
        location: { lat: 48.8566, lng: 2.3522 },
        placeId: 'place-48.8566-2.3522',
        country: 'France'
      }
    });
    expect(requests[0]).toEqual({ url: 'geocode/json', params: { address: 'Paris', key: TEST_KEY } });
  });

  it('maps Google status codes to failure reasons', async () => {
    const reasonFor = async (status: string) => {
      const { http } = createFakeHttp(() => ok({ status, results: [] }));
      const result = await new GeocodingService(TEST_KEY, http).getCoordinates('Nowhere');
      return result.ok ? null : result.failure.reason;
    };

    expect(await reasonFor('ZERO_RESULTS')).toBe('not_found');
    expect(await reasonFor('REQUEST_DENIED')).toBe('authentication');
    expect(await reasonFor('OVER_QUERY_LIMIT')).toBe('quota_exceeded');
    expect(await reasonFor('UNKNOWN_ERROR')).toBe('upstream_error');
  });

  it('prefers the error message Google sends', async () => {
    const { http } = createFakeHttp(() =>
      ok({ status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.' })
    );

    const result = await new GeocodingService(TEST_KEY, http).getCoordinates('Paris');

    expect(result).toEqual({
      ok: false,
      failure: { service: 'geocoding', reason: 'authentication', message: 'The provided API key is invalid.' }
    });
  });

  it('treats an OK status without results as not found', async () => {
    const { http } = createFakeHttp(() => ok({ status: 'OK', results: [] }));

    const result = await new GeocodingService(TEST_KEY, http).getCoordinates('Nowhere');

    expect(result).toEqual({
      ok: false,
      failure: { service: 'geocoding', reason: 'not_found', message: 'No match for "Nowhere"' }
    });
  });

  it('fails without a key and makes no request', async () => {
    const { http, requests } = createFakeHttp(() => ok({}));

    const result = await new GeocodingService(undefined, http).getCoordinates('Paris');

    expect(result.ok ? null : result.failure.reason).toBe('not_configured');
    expect(requests).toHaveLength(0);
  });

  it('reports transport errors without throwing', async () => {
    const { http } = createFakeHttp(() => ({ error: 'network' }));

    const result = await new GeocodingService(TEST_KEY, http).getCoordinates('Paris');

    expect(result).toEqual({
      ok: false,
      failure: { service: 'geocoding', reason: 'network', message: 'connect ECONNREFUSED 127.0.0.1:443' }
    });
  });
});

describe('PlacesService', () => {
  it('searches around a point by type', async () => {
    const { http, requests } = createFakeHttp(() => ok(placesPayload('Louvre Museum')));
    const service = new PlacesService(TEST_KEY, http);

    const result = await service.searchNearby({ lat: 48.85, lng: 2.35 }, 'tourist_attraction');

    expect(requests[0]?.params).toEqual({
      location: '48.85,2.35',
      radius: 5000,
      type: 'tourist_attraction',
      key: TEST_KEY
    });
    expect(result).toEqual({
      ok: true,
      data: [
        {
          placeId: 'louvre-museum',
          name: 'Louvre Museum',
          address: '1 Test Street',
          location: { lat: 48.85, lng: 2.35 },
          rating: 4.5
        }
      ]
    });
  });

  it('only biases text search when a point is given', async () => {
    const { http, requests } = createFakeHttp(routeByUrl({ 'place/textsearch/json': ok(placesPayload()) }));
    const service = new PlacesService(TEST_KEY, http);

    await service.textSearch('crepes');
    await service.textSearch('crepes', { lat: 1, lng: 2 }, 1000);

    expect(requests.map((request) => request.params)).toEqual([
      { query: 'crepes', key: TEST_KEY },
      { query: 'crepes', location: '1,2', radius: 1000, key: TEST_KEY }
    ]);
  });
});

describe('TimezoneService', () => {
  it('resolves the zone for the given instant', async () => {
    const { http, requests } = createFakeHttp(() => ok(timezonePayload));

    const result = await new TimezoneService(TEST_KEY, http).getTimezone({ lat: 48.85, lng: 2.35 }, 1717200000);

    expect(requests[0]?.params).toEqual({ location: '48.85,2.35', timestamp: 1717200000, key: TEST_KEY });
    expect(result).toEqual({
      ok: true,
      data: {
        timeZoneId: 'Europe/Paris',
        timeZoneName: 'Central European Summer Time',
        rawOffset: 3600,
        dstOffset: 3600
      }
    });
  });
});

describe('DirectionsService', () => {
  it('sums leg distances and durations per route', async () => {
    const leg = (from: string, to: string, meters: number, seconds: number) => ({
      start_address: from,
      end_address: to,
      distance: { text: `${meters / 1000} km`, value: meters },
      duration: { text: `${seconds / 60} mins`, value: seconds }
    });
    const { http, requests } = createFakeHttp(() =>
      ok({
        status: 'OK',
        routes: [{ summary: 'A1', legs: [leg('Paris', 'Lille', 225000, 8100), leg('Lille', 'Brussels', 110000, 4200)] }]
      })
    );

    const result = await new DirectionsService(TEST_KEY, http).getDirections({
      origin: 'Paris',
      destination: 'Brussels',
      waypoints: ['Lille']
    });

    expect(requests[0]?.params).toEqual({
      origin: 'Paris',
      destination: 'Brussels',
      mode: 'driving',
      waypoints: 'Lille',
      key: TEST_KEY
    });
    expect(result.ok ? result.data.map(({ summary, distanceMeters, durationSeconds, warnings }) => ({
      summary,
      distanceMeters,
      durationSeconds,
      warnings
    })) : null).toEqual([{ summary: 'A1', distanceMeters: 335000, durationSeconds: 12300, warnings: [] }]);
  });
});

describe('StaticMapService', () => {
  it('builds a signed image URL with markers', () => {
    const result = new StaticMapService(TEST_KEY).buildUrl({
      center: 'Paris, France',
      markers: ['color:red|48.85,2.35']
    });

    expect(result).toEqual({
      ok: true,
      data:
        'https://maps.googleapis.com/maps/api/staticmap?center=Paris%2C+France&zoom=13&size=600x400&key=test-secret&markers=color%3Ared%7C48.85%2C2.35'
    });
  });

  it('fails without a key', () => {
    expect(new StaticMapService(undefined).buildUrl({ center: 'Paris' })).toEqual({
      ok: false,
      failure: { service: 'static-map', reason: 'not_configured', message: 'GOOGLE_API_KEY is not set' }
    });
  });
});
