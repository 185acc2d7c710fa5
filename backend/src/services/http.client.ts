import axios, { AxiosInstance } from 'axios';
import { AdapterResult, ServiceName, fail, reasonForStatus } from './adapter-result';

export const createHttpClient = (baseURL: string, timeout: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout,
    headers: { Accept: 'application/json' }
  });

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Translates whatever axios threw into an adapter failure. Upstream
 * problems never escape an adapter as exceptions.
 */
export const failureFromError = (service: ServiceName, error: unknown): AdapterResult<never> => {
  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return fail(service, 'timeout', error.message);
    }
    if (error.response) {
      const { status } = error.response;
      return fail(service, reasonForStatus(status), `HTTP ${status}: ${error.message}`, status);
    }
    return fail(service, 'network', error.message);
  }

  const message = error instanceof Error ? error.message : String(error);
  return fail(service, 'upstream_error', message);
};
