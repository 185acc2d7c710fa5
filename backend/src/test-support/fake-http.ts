import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosResponse } from 'axios';

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
}

export type FakeReply = { status: number; data: unknown } | { error: 'timeout' | 'network' };

export type FakeRoute = (request: RecordedRequest) => FakeReply;

export interface FakeHttp {
  http: AxiosInstance;
  requests: RecordedRequest[];
}

export const ok = (data: unknown): FakeReply => ({ status: 200, data });

/**
 * An axios instance whose adapter answers in process. Non-2xx replies and
 * simulated outages reject with the same AxiosError shapes the real
 * adapters produce.
 */
export const createFakeHttp = (route: FakeRoute): FakeHttp => {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = { url: config.url ?? '', params: { ...config.params } };
    requests.push(request);

    const reply = route(request);
    if ('error' in reply) {
      if (reply.error === 'timeout') {
        throw new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', config);
      }
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }
    return response;
  };

  return { http: axios.create({ baseURL: 'https://upstream.test', adapter }), requests };
};

/** Routes requests by URL; anything unexpected answers 404. */
export const routeByUrl = (replies: Record<string, FakeReply | FakeRoute>): FakeRoute => (request) => {
  const reply = replies[request.url];
  if (reply === undefined) {
    return { status: 404, data: { message: 'not found' } };
  }
  return typeof reply === 'function' ? reply(request) : reply;
};
