import { ProviderServices } from '../container';
import { AdapterResult, succeed } from '../services/adapter-result';
import { CurrencyService } from '../services/currency.service';
import { DirectionsService } from '../services/directions.service';
import { TextGenerator } from '../services/gemini.service';
import { GeocodingService } from '../services/geocoding.service';
import { PlacesService } from '../services/places.service';
import { StaticMapService } from '../services/static-map.service';
import { TimezoneService } from '../services/timezone.service';
import { WeatherService } from '../services/weather.service';
import { FakeRoute, RecordedRequest, createFakeHttp, ok, routeByUrl } from './fake-http';
import {
  TEST_KEY,
  forecastPayload,
  geocodePayload,
  placesPayload,
  ratesPayload,
  timezonePayload
} from './fixtures';

/** A model stand-in that records prompts and answers from a script. */
export class ScriptedGenerator implements TextGenerator {
  readonly modelName = 'gemini-test';
  readonly prompts: string[] = [];

  constructor(
    private readonly answer: (prompt: string) => AdapterResult<string>,
    readonly isConfigured: boolean = true
  ) {}

  async generate(prompt: string): Promise<AdapterResult<string>> {
    this.prompts.push(prompt);
    return this.answer(prompt);
  }
}

export const answersWith = (text: string): ScriptedGenerator => new ScriptedGenerator(() => succeed(text));

export const parisGoogleRoutes: FakeRoute = routeByUrl({
  'geocode/json': ok(geocodePayload('Paris, France', 48.8566, 2.3522, 'France')),
  'timezone/json': ok(timezonePayload),
  'place/nearbysearch/json': (request) =>
    request.params.type === 'restaurant' ? ok(placesPayload('Le Bistro')) : ok(placesPayload('Louvre Museum', 'Eiffel Tower')),
  'place/textsearch/json': ok(placesPayload('Creperie du Marais')),
  'directions/json': ok({
    status: 'OK',
    routes: [
      {
        summary: 'Rue de Rivoli',
        legs: [
          {
            start_address: 'Louvre Museum, Paris',
            end_address: 'Eiffel Tower, Paris',
            distance: { text: '4.1 km', value: 4100 },
            duration: { text: '12 mins', value: 720 }
          }
        ]
      }
    ]
  })
});

export const parisWeather: FakeRoute = routeByUrl({
  '/forecast': ok(forecastPayload('2024-06-01', 5)),
  '/weather': ok({
    name: 'Paris',
    main: { temp: 21.5, feels_like: 21, humidity: 48 },
    wind: { speed: 3.6 },
    weather: [{ description: 'few clouds' }]
  })
});

export const usdRates: FakeRoute = routeByUrl({
  '/latest/USD': ok(ratesPayload({ EUR: 0.92, GBP: 0.79, JPY: 155 }))
});

export interface FakeProviderOptions {
  ai?: TextGenerator;
  google?: FakeRoute;
  weather?: FakeRoute;
  rates?: FakeRoute;
  googleApiKey?: string;
  weatherApiKey?: string;
}

export interface FakeProviders {
  providers: ProviderServices;
  requests: {
    google: RecordedRequest[];
    weather: RecordedRequest[];
    rates: RecordedRequest[];
  };
}

/** Real adapters over in-process HTTP, answering as if every API knows Paris. */
export const createFakeProviders = (options: FakeProviderOptions = {}): FakeProviders => {
  const google = createFakeHttp(options.google ?? parisGoogleRoutes);
  const weather = createFakeHttp(options.weather ?? parisWeather);
  const rates = createFakeHttp(options.rates ?? usdRates);
  const googleKey = 'googleApiKey' in options ? options.googleApiKey : TEST_KEY;
  const weatherKey = 'weatherApiKey' in options ? options.weatherApiKey : TEST_KEY;

  return {
    providers: {
      ai: options.ai ?? answersWith('{}'),
      geocoding: new GeocodingService(googleKey, google.http),
      places: new PlacesService(googleKey, google.http),
      timezone: new TimezoneService(googleKey, google.http),
      directions: new DirectionsService(googleKey, google.http),
      staticMap: new StaticMapService(googleKey),
      weather: new WeatherService(weatherKey, weather.http),
      currency: new CurrencyService(rates.http)
    },
    requests: {
      google: google.requests,
      weather: weather.requests,
      rates: rates.requests
    }
  };
};
