import { AppConfig } from './config/environment';
import { CurrencyService, EXCHANGE_RATE_BASE_URL } from './services/currency.service';
import { DirectionsService } from './services/directions.service';
import { EnvironmentService } from './services/environment.service';
import { GeminiService, TextGenerator } from './services/gemini.service';
import { GeocodingService } from './services/geocoding.service';
import { GOOGLE_MAPS_BASE_URL } from './services/google-api.service';
import { createHttpClient } from './services/http.client';
import { ItineraryService } from './services/itinerary.service';
import { PlacesService } from './services/places.service';
import { StaticMapService } from './services/static-map.service';
import { TimezoneService } from './services/timezone.service';
import { OPENWEATHERMAP_BASE_URL, WeatherService } from './services/weather.service';

export interface AppServices {
  config: Readonly<AppConfig>;
  ai: TextGenerator;
  geocoding: GeocodingService;
  places: PlacesService;
  timezone: TimezoneService;
  directions: DirectionsService;
  staticMap: StaticMapService;
  weather: WeatherService;
  currency: CurrencyService;
  environment: EnvironmentService;
  itinerary: ItineraryService;
}

export type ProviderServices = Omit<AppServices, 'config' | 'environment' | 'itinerary'>;

/** Wires the itinerary and environment services on top of the provider adapters. */
export const assembleServices = (config: Readonly<AppConfig>, providers: ProviderServices): AppServices => {
  const environment = new EnvironmentService(providers);
  const itinerary = new ItineraryService({ ai: providers.ai, environment });
  return { config, ...providers, environment, itinerary };
};

export const createServices = (config: Readonly<AppConfig>): AppServices => {
  const google = createHttpClient(GOOGLE_MAPS_BASE_URL, config.httpTimeoutMs);
  const openWeather = createHttpClient(OPENWEATHERMAP_BASE_URL, config.httpTimeoutMs);
  const exchangeRates = createHttpClient(EXCHANGE_RATE_BASE_URL, config.httpTimeoutMs);

  return assembleServices(config, {
    ai: new GeminiService(config),
    geocoding: new GeocodingService(config.googleApiKey, google),
    places: new PlacesService(config.googleApiKey, google),
    timezone: new TimezoneService(config.googleApiKey, google),
    directions: new DirectionsService(config.googleApiKey, google),
    staticMap: new StaticMapService(config.googleApiKey),
    weather: new WeatherService(config.openWeatherMapApiKey, openWeather),
    currency: new CurrencyService(exchangeRates)
  });
};
