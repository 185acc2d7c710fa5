import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { AdapterFailureReason, AdapterResult, ServiceName, fail, succeed } from './adapter-result';
import { failureFromError } from './http.client';

export const GOOGLE_MAPS_BASE_URL = 'https://maps.googleapis.com/maps/api';

export type QueryParams = Record<string, string | number | boolean>;

export const latLngSchema = z.object({
  lat: z.number(),
  lng: z.number()
});

const statusEnvelope = z.object({
  status: z.string(),
  error_message: z.string().optional()
});

// https://developers.google.com/maps/documentation/geocoding/requests-geocoding#StatusCodes
const reasonForGoogleStatus = (status: string): AdapterFailureReason => {
  switch (status) {
    case 'REQUEST_DENIED':
      return 'authentication';
    case 'OVER_QUERY_LIMIT':
    case 'OVER_DAILY_LIMIT':
      return 'quota_exceeded';
    case 'ZERO_RESULTS':
    case 'NOT_FOUND':
      return 'not_found';
    default:
      return 'upstream_error';
  }
};

/**
 * Shared plumbing for the Google Maps Platform web services: they all take
 * the key as a query parameter and report errors in a `status` field of a
 * 200 response.
 */
export abstract class GoogleApiService {
  protected abstract readonly service: ServiceName;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly http: AxiosInstance
  ) {}

  get isConfigured(): boolean {
    return this.apiKey !== undefined;
  }

  protected async request<T>(
    endpoint: string,
    params: QueryParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<AdapterResult<T>> {
    if (!this.apiKey) {
      return fail(this.service, 'not_configured', 'GOOGLE_API_KEY is not set');
    }

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(endpoint, {
        params: { ...params, key: this.apiKey }
      });
      body = response.data;
    } catch (error) {
      return failureFromError(this.service, error);
    }

    const envelope = statusEnvelope.safeParse(body);
    if (!envelope.success) {
      return fail(this.service, 'malformed_response', `Unexpected payload from ${endpoint}`);
    }

    const { status, error_message: errorMessage } = envelope.data;
    if (status !== 'OK') {
      return fail(this.service, reasonForGoogleStatus(status), errorMessage ?? status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'shape mismatch';
      return fail(this.service, 'malformed_response', `Unexpected payload from ${endpoint} (${where})`);
    }

    return succeed(parsed.data);
  }
}
