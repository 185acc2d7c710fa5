import { describe, it, expect, beforeEach, vi } from 'vitest';
import { routeByUrl } from '../test-support/fake-http';
import { createFakeProviders, parisGoogleRoutes, parisWeather } from '../test-support/providers';
import { EnvironmentService } from './environment.service';

const serverError = { status: 500, data: { message: 'boom' } };

describe('EnvironmentService.gather', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('collects every section for a known destination', async () => {
    const { providers, requests } = createFakeProviders();
    const service = new EnvironmentService(providers);

    const context = await service.gather('Paris, France', '2024-06-01', '2024-06-03');

    expect(context.location).toEqual({
      formattedAddress: 'Paris, France',
      location: { lat: 48.8566, lng: 2.3522 },
      placeId: 'place-48.8566-2.3522',
      country: 'France'
    });
    expect(context.timezone?.timeZoneId).toBe('Europe/Paris');
    expect(context.weather?.days.map((day) => day.date)).toEqual(['2024-06-01', '2024-06-02', '2024-06-03']);
    expect(context.nearby?.attractions.map((place) => place.name)).toEqual(['Louvre Museum', 'Eiffel Tower']);
    expect(context.nearby?.restaurants.map((place) => place.name)).toEqual(['Le Bistro']);
    expect(context.currency?.formattedRate).toBe('1 USD = 0.92 EUR');
    expect(context.mapUrl).toBe(
      'https://maps.googleapis.com/maps/api/staticmap?center=Paris%2C+France&zoom=13&size=600x400&key=test-secret&markers=color%3Ared%7C48.8566%2C2.3522'
    );
    expect(requests.google.find((request) => request.url === 'timezone/json')?.params.timestamp).toBe(1717200000);
  });

  it('leaves the weather panel out when the forecast fails', async () => {
    const { providers } = createFakeProviders({ weather: () => serverError });
    const service = new EnvironmentService(providers);

    const context = await service.gather('Paris, France', '2024-06-01', '2024-06-03');

    expect(context.weather).toBeNull();
    expect(context.location).not.toBeNull();
    expect(context.currency?.localCurrency).toBe('EUR');
    expect(console.warn).toHaveBeenCalledWith(
      'Weather unavailable for "Paris, France" [weather/upstream_error]: HTTP 500: Request failed with status code 500'
    );
  });

  it('still reports currency and a map when geocoding fails', async () => {
    const { providers, requests } = createFakeProviders({ google: () => serverError });
    const service = new EnvironmentService(providers);

    const context = await service.gather('Kyoto, Japan', '2024-06-01', '2024-06-03');

    expect(context).toEqual({
      location: null,
      timezone: null,
      weather: null,
      nearby: null,
      currency: {
        country: 'Japan',
        localCurrency: 'JPY',
        baseCurrency: 'USD',
        exchangeRate: 155,
        formattedRate: '1 USD = 155.00 JPY'
      },
      mapUrl: 'https://maps.googleapis.com/maps/api/staticmap?center=Kyoto%2C+Japan&zoom=13&size=600x400&key=test-secret'
    });
    expect(requests.google).toHaveLength(1);
    expect(requests.weather).toHaveLength(0);
  });

  it('keeps the restaurants when the attraction search fails', async () => {
    const { providers } = createFakeProviders({
      google: (request) =>
        request.url === 'place/nearbysearch/json' && request.params.type === 'tourist_attraction'
          ? serverError
          : parisGoogleRoutes(request)
    });
    const service = new EnvironmentService(providers);

    const context = await service.gather('Paris, France', '2024-06-01', '2024-06-03');

    expect(context.nearby).toEqual({
      attractions: [],
      restaurants: [
        {
          placeId: 'le-bistro',
          name: 'Le Bistro',
          address: '1 Test Street',
          location: { lat: 48.85, lng: 2.35 },
          rating: 4.5
        }
      ]
    });
  });

  it('returns an empty panel when the forecast does not reach the trip dates', async () => {
    const { providers } = createFakeProviders();
    const service = new EnvironmentService(providers);

    const context = await service.gather('Paris, France', '2025-01-10', '2025-01-12');

    expect(context.weather).toEqual({ days: [] });
  });
});

describe('EnvironmentService.describeLocation', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('combines coordinates with current conditions', async () => {
    const { providers } = createFakeProviders();
    const service = new EnvironmentService(providers);

    const result = await service.describeLocation('Paris');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.location.formattedAddress).toBe('Paris, France');
    expect(result.data.weather?.description).toBe('few clouds');
    expect(result.data.timezone?.timeZoneName).toBe('Central European Summer Time');
    expect(result.data.nearby?.attractions).toHaveLength(2);
  });

  it('adds attractions within ten kilometres for a destination', async () => {
    const { providers, requests } = createFakeProviders();
    const service = new EnvironmentService(providers);

    const result = await service.describeDestination('Paris');

    expect(result.ok ? result.data.attractions.map((place) => place.name) : null).toEqual([
      'Louvre Museum',
      'Eiffel Tower'
    ]);
    expect(requests.google.at(-1)?.params).toEqual({
      location: '48.8566,2.3522',
      radius: 10000,
      type: 'tourist_attraction',
      key: 'test-secret'
    });
  });

  it('fails when the place cannot be geocoded', async () => {
    const { providers } = createFakeProviders({
      google: routeByUrl({}),
      weather: parisWeather
    });
    const service = new EnvironmentService(providers);

    const result = await service.describeLocation('Atlantis');

    expect(result.ok ? null : result.failure.reason).toBe('not_found');
  });
});
