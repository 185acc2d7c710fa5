import { AdapterResult, fail, succeed } from './adapter-result';
import { GOOGLE_MAPS_BASE_URL } from './google-api.service';

export const DEFAULT_MAP_ZOOM = 13;
export const DEFAULT_MAP_SIZE = '600x400';

export interface StaticMapParams {
  center: string;
  zoom?: number;
  size?: string;
  markers?: string[];
}

/** Builds Maps Static API image URLs; the browser fetches the image itself. */
export class StaticMapService {
  constructor(private readonly apiKey: string | undefined) {}

  buildUrl({ center, zoom = DEFAULT_MAP_ZOOM, size = DEFAULT_MAP_SIZE, markers = [] }: StaticMapParams): AdapterResult<string> {
    if (!this.apiKey) {
      return fail('static-map', 'not_configured', 'GOOGLE_API_KEY is not set');
    }

    const query = new URLSearchParams({
      center,
      zoom: String(zoom),
      size,
      key: this.apiKey
    });
    for (const marker of markers) {
      query.append('markers', marker);
    }

    return succeed(`${GOOGLE_MAPS_BASE_URL}/staticmap?${query.toString()}`);
  }
}
