export type ServiceName =
  | 'gemini'
  | 'geocoding'
  | 'places'
  | 'timezone'
  | 'directions'
  | 'static-map'
  | 'weather'
  | 'currency';

export type AdapterFailureReason =
  | 'not_configured'
  | 'timeout'
  | 'network'
  | 'authentication'
  | 'quota_exceeded'
  | 'not_found'
  | 'malformed_response'
  | 'upstream_error';

export interface AdapterFailure {
  service: ServiceName;
  reason: AdapterFailureReason;
  message: string;
  status?: number;
}

export type AdapterResult<T> =
  | { ok: true; data: T }
  | { ok: false; failure: AdapterFailure };

export const succeed = <T>(data: T): AdapterResult<T> => ({ ok: true, data });

export const fail = <T>(
  service: ServiceName,
  reason: AdapterFailureReason,
  message: string,
  status?: number
): AdapterResult<T> => ({
  ok: false,
  failure: status === undefined ? { service, reason, message } : { service, reason, message, status }
});

export const reasonForStatus = (status: number): AdapterFailureReason => {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'quota_exceeded';
  if (status === 404) return 'not_found';
  return 'upstream_error';
};
