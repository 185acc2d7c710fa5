import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { CurrentWeather, DailyForecast, LatLng } from '../models/environment.model';
import { AdapterResult, fail, succeed } from './adapter-result';
import { failureFromError } from './http.client';

export const OPENWEATHERMAP_BASE_URL = 'https://api.openweathermap.org/data/2.5';
export const DEFAULT_FORECAST_DAYS = 5;
// The free forecast endpoint returns one entry every three hours.
const ENTRIES_PER_DAY = 8;

const conditionSchema = z.array(z.object({ description: z.string() })).min(1);

const currentWeatherSchema = z.object({
  name: z.string().default(''),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number()
  }),
  wind: z.object({ speed: z.number() }).default({ speed: 0 }),
  weather: conditionSchema
});

const forecastSchema = z.object({
  list: z.array(
    z.object({
      dt: z.number(),
      main: z.object({
        temp_min: z.number(),
        temp_max: z.number(),
        humidity: z.number()
      }),
      weather: conditionSchema,
      pop: z.number().default(0)
    })
  ),
  city: z.object({ timezone: z.number().default(0) }).default({})
});

type ForecastEntry = z.infer<typeof forecastSchema>['list'][number];

const round1 = (value: number): number => Math.round(value * 10) / 10;

const mostFrequent = (values: string[]): string => {
  const counts = new Map<string, number>();
  let best = values[0] ?? '';
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > (counts.get(best) ?? 0)) {
      best = value;
    }
  }
  return best;
};

/**
 * Folds 3-hourly forecast entries into one record per local calendar day.
 * `utcOffsetSeconds` is the city's offset as reported by OpenWeatherMap.
 */
export const foldDailyForecast = (entries: ForecastEntry[], utcOffsetSeconds: number): DailyForecast[] => {
  const byDate = new Map<string, ForecastEntry[]>();
  for (const entry of entries) {
    const date = new Date((entry.dt + utcOffsetSeconds) * 1000).toISOString().slice(0, 10);
    const bucket = byDate.get(date);
    if (bucket) {
      bucket.push(entry);
    } else {
      byDate.set(date, [entry]);
    }
  }

  return [...byDate.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, bucket]) => ({
      date,
      tempMin: round1(Math.min(...bucket.map((entry) => entry.main.temp_min))),
      tempMax: round1(Math.max(...bucket.map((entry) => entry.main.temp_max))),
      description: mostFrequent(bucket.map((entry) => entry.weather[0]?.description ?? '')),
      humidity: Math.round(bucket.reduce((total, entry) => total + entry.main.humidity, 0) / bucket.length),
      precipitationChance: Math.max(...bucket.map((entry) => entry.pop))
    }));
};

export class WeatherService {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly http: AxiosInstance
  ) {}

  get isConfigured(): boolean {
    return this.apiKey !== undefined;
  }

  async getCurrentWeather({ lat, lng }: LatLng): Promise<AdapterResult<CurrentWeather>> {
    const body = await this.fetch('/weather', { lat, lon: lng });
    if (!body.ok) return body;

    const parsed = currentWeatherSchema.safeParse(body.data);
    if (!parsed.success) {
      return fail('weather', 'malformed_response', 'Unexpected current weather payload');
    }

    const { name, main, wind, weather } = parsed.data;
    return succeed({
      temperature: main.temp,
      feelsLike: main.feels_like,
      humidity: main.humidity,
      windSpeed: wind.speed,
      description: weather[0]?.description ?? '',
      locationName: name
    });
  }

  async getForecast({ lat, lng }: LatLng, days = DEFAULT_FORECAST_DAYS): Promise<AdapterResult<DailyForecast[]>> {
    const body = await this.fetch('/forecast', { lat, lon: lng, cnt: days * ENTRIES_PER_DAY });
    if (!body.ok) return body;

    const parsed = forecastSchema.safeParse(body.data);
    if (!parsed.success) {
      return fail('weather', 'malformed_response', 'Unexpected forecast payload');
    }

    return succeed(foldDailyForecast(parsed.data.list, parsed.data.city.timezone));
  }

  private async fetch(path: string, params: Record<string, number>): Promise<AdapterResult<unknown>> {
    if (!this.apiKey) {
      return fail('weather', 'not_configured', 'OPENWEATHERMAP_API_KEY is not set');
    }

    try {
      const response = await this.http.get<unknown>(path, {
        params: { ...params, appid: this.apiKey, units: 'metric' }
      });
      return succeed(response.data);
    } catch (error) {
      return failureFromError('weather', error);
    }
  }
}
