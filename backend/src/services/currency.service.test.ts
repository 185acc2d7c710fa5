import { describe, it, expect } from 'vitest';
import { createFakeHttp, ok } from '../test-support/fake-http';
import { ratesPayload } from '../test-support/fixtures';
import { CurrencyService, countryFromDestination, getCountryCurrency } from './currency.service';

describe('countryFromDestination', () => {
  it('takes the last comma-separated part', () => {
    expect(countryFromDestination('Paris, France')).toBe('France');
    expect(countryFromDestination('Kyoto')).toBe('Kyoto');
  });
});

describe('getCountryCurrency', () => {
  it('matches exact and partial country names', () => {
    expect(getCountryCurrency('Japan')).toBe('JPY');
    expect(getCountryCurrency('france')).toBe('EUR');
  });

  it('does not let short codes match inside longer names', () => {
    expect(getCountryCurrency('Russian Federation')).toBe('RUB');
    expect(getCountryCurrency('Atlantis')).toBe('USD');
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(getCountryCurrency('constructor')).toBe('USD');
    expect(getCountryCurrency('toString')).toBe('USD');
    expect(getCountryCurrency('__proto__')).toBe('USD');
  });
});

describe('CurrencyService', () => {
  it('formats the rate against the base currency', async () => {
    const { http, requests } = createFakeHttp(() => ok(ratesPayload({ EUR: 0.9234, JPY: 155.1 })));
    const service = new CurrencyService(http);

    const result = await service.getCurrencyInfo('France');

    expect(result).toEqual({
      ok: true,
      data: {
        country: 'France',
        localCurrency: 'EUR',
        baseCurrency: 'USD',
        exchangeRate: 0.9234,
        formattedRate: '1 USD = 0.92 EUR'
      }
    });
    expect(requests[0]?.url).toBe('/latest/USD');
  });

  it('skips the lookup when both currencies are the same', async () => {
    const { http, requests } = createFakeHttp(() => ok(ratesPayload({})));
    const service = new CurrencyService(http);

    const result = await service.getExchangeRate('USD', 'USD');

    expect(result).toEqual({ ok: true, data: 1 });
    expect(requests).toHaveLength(0);
  });

  it('reports a missing rate as not found', async () => {
    const { http } = createFakeHttp(() => ok(ratesPayload({ GBP: 0.79 })));
    const service = new CurrencyService(http);

    const result = await service.getExchangeRate('USD', 'JPY');

    expect(result).toEqual({
      ok: false,
      failure: { service: 'currency', reason: 'not_found', message: 'No USD -> JPY rate' }
    });
  });

  it('maps timeouts and HTTP errors to failures', async () => {
    const timedOut = new CurrencyService(createFakeHttp(() => ({ error: 'timeout' })).http);
    const rateLimited = new CurrencyService(createFakeHttp(() => ({ status: 429, data: {} })).http);

    const timeout = await timedOut.getExchangeRate('USD', 'EUR');
    const quota = await rateLimited.getExchangeRate('USD', 'EUR');

    expect(timeout.ok ? null : timeout.failure.reason).toBe('timeout');
    expect(quota).toEqual({
      ok: false,
      failure: {
        service: 'currency',
        reason: 'quota_exceeded',
        message: 'HTTP 429: Request failed with status code 429',
        status: 429
      }
    });
  });
});
