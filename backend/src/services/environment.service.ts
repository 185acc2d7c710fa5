import {
  CurrentWeather,
  EnvironmentContext,
  GeocodedLocation,
  LatLng,
  NearbyPlaces,
  PlaceSummary,
  TimezoneInfo,
  WeatherPanel
} from '../models/environment.model';
import { parseIsoDate } from '../utils/dates';
import { AdapterFailure, AdapterResult, succeed } from './adapter-result';
import { CurrencyService, countryFromDestination } from './currency.service';
import { GeocodingService } from './geocoding.service';
import { PlacesService } from './places.service';
import { StaticMapService } from './static-map.service';
import { TimezoneService } from './timezone.service';
import { WeatherService } from './weather.service';

export interface LocationServices {
  geocoding: GeocodingService;
  places: PlacesService;
  timezone: TimezoneService;
  weather: WeatherService;
  currency: CurrencyService;
  staticMap: StaticMapService;
}

export interface LocationInfo {
  location: GeocodedLocation;
  timezone: TimezoneInfo | null;
  weather: CurrentWeather | null;
  nearby: NearbyPlaces | null;
}

export interface DestinationDetails extends LocationInfo {
  attractions: PlaceSummary[];
}

export const DESTINATION_ATTRACTION_RADIUS = 10000;
export const DESTINATION_ATTRACTION_LIMIT = 10;

const warnDegraded = (section: string, subject: string, failure: AdapterFailure): void => {
  console.warn(`${section} unavailable for "${subject}" [${failure.service}/${failure.reason}]: ${failure.message}`);
};

const orNull = <T>(result: AdapterResult<T>, section: string, subject: string): T | null => {
  if (result.ok) return result.data;
  warnDegraded(section, subject, result.failure);
  return null;
};

/**
 * Collects the side panels shown next to an itinerary. Every lookup is
 * optional: a failed call leaves its section null and the rest carry on.
 */
export class EnvironmentService {
  constructor(private readonly services: LocationServices) {}

  async gather(destination: string, startDate: string, endDate: string): Promise<EnvironmentContext> {
    const { geocoding, timezone, weather, currency, staticMap } = this.services;

    const location = orNull(await geocoding.getCoordinates(destination), 'Location', destination);

    let timezoneInfo: TimezoneInfo | null = null;
    let weatherPanel: WeatherPanel | null = null;
    let nearby: NearbyPlaces | null = null;

    if (location) {
      const start = parseIsoDate(startDate);
      const timestamp = start ? Math.floor(start.getTime() / 1000) : undefined;
      timezoneInfo = orNull(await timezone.getTimezone(location.location, timestamp), 'Time zone', destination);

      const forecast = orNull(await weather.getForecast(location.location), 'Weather', destination);
      if (forecast) {
        weatherPanel = {
          days: forecast.filter((day) => day.date >= startDate && day.date <= endDate)
        };
      }

      nearby = await this.findNearby(location.location, destination);
    }

    const country = location?.country ?? countryFromDestination(destination);
    const currencyInfo = orNull(await currency.getCurrencyInfo(country), 'Currency', destination);

    const mapUrl = orNull(
      staticMap.buildUrl({
        center: location?.formattedAddress ?? destination,
        markers: location ? [`color:red|${location.location.lat},${location.location.lng}`] : []
      }),
      'Map',
      destination
    );

    return {
      location,
      timezone: timezoneInfo,
      weather: weatherPanel,
      nearby,
      currency: currencyInfo,
      mapUrl
    };
  }

  /** Geocodes a free-text place and gathers what is known about it right now. */
  async describeLocation(query: string): Promise<AdapterResult<LocationInfo>> {
    const { geocoding, timezone, weather } = this.services;

    const geocoded = await geocoding.getCoordinates(query);
    if (!geocoded.ok) return geocoded;
    const location = geocoded.data;

    const timezoneInfo = orNull(await timezone.getTimezone(location.location), 'Time zone', query);
    const currentWeather = orNull(await weather.getCurrentWeather(location.location), 'Weather', query);
    const nearby = await this.findNearby(location.location, query);

    return succeed({ location, timezone: timezoneInfo, weather: currentWeather, nearby });
  }

  /** Location info plus the top attractions within ten kilometres. */
  async describeDestination(name: string): Promise<AdapterResult<DestinationDetails>> {
    const info = await this.describeLocation(name);
    if (!info.ok) return info;

    const attractions = orNull(
      await this.services.places.searchNearby(
        info.data.location.location,
        'tourist_attraction',
        DESTINATION_ATTRACTION_RADIUS
      ),
      'Attractions',
      name
    );

    return succeed({
      ...info.data,
      attractions: (attractions ?? []).slice(0, DESTINATION_ATTRACTION_LIMIT)
    });
  }

  private async findNearby(point: LatLng, subject: string): Promise<NearbyPlaces | null> {
    const { places } = this.services;
    const attractions = await places.searchNearby(point, 'tourist_attraction');
    const restaurants = await places.searchNearby(point, 'restaurant');

    if (!attractions.ok && !restaurants.ok) {
      warnDegraded('Nearby places', subject, attractions.failure);
      return null;
    }

    const listOrEmpty = (result: AdapterResult<PlaceSummary[]>): PlaceSummary[] => (result.ok ? result.data : []);
    return {
      attractions: listOrEmpty(attractions),
      restaurants: listOrEmpty(restaurants)
    };
  }
}
