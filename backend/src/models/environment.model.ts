export interface LatLng {
  lat: number;
  lng: number;
}

export interface GeocodedLocation {
  formattedAddress: string;
  location: LatLng;
  placeId: string;
  country?: string;
}

export interface TimezoneInfo {
  timeZoneId: string;
  timeZoneName: string;
  /** seconds */
  rawOffset: number;
  /** seconds */
  dstOffset: number;
}

export interface PlaceSummary {
  placeId: string;
  name: string;
  address: string;
  location: LatLng;
  rating?: number;
}

export interface NearbyPlaces {
  attractions: PlaceSummary[];
  restaurants: PlaceSummary[];
}

export interface CurrentWeather {
  temperature: number;
  feelsLike: number;
  humidity: number;
  windSpeed: number;
  description: string;
  locationName: string;
}

export interface DailyForecast {
  /** YYYY-MM-DD */
  date: string;
  tempMin: number;
  tempMax: number;
  description: string;
  humidity: number;
  /** 0..1 */
  precipitationChance: number;
}

export interface WeatherPanel {
  days: DailyForecast[];
}

export interface CurrencyInfo {
  country: string;
  localCurrency: string;
  baseCurrency: string;
  exchangeRate: number;
  formattedRate: string;
}

export interface RouteLeg {
  startAddress: string;
  endAddress: string;
  distanceMeters: number;
  durationSeconds: number;
  distanceText: string;
  durationText: string;
}

export interface RouteSummary {
  summary: string;
  distanceMeters: number;
  durationSeconds: number;
  legs: RouteLeg[];
  warnings: string[];
}

/**
 * Everything the itinerary page shows next to the plan. A null section
 * means the service behind it failed and the panel is left out.
 */
export interface EnvironmentContext {
  location: GeocodedLocation | null;
  timezone: TimezoneInfo | null;
  weather: WeatherPanel | null;
  nearby: NearbyPlaces | null;
  currency: CurrencyInfo | null;
  mapUrl: string | null;
}
