import { AxiosInstance } from 'axios';
import { z } from 'zod';
import countryCurrencies from '../data/country-currencies.json';
import { CurrencyInfo } from '../models/environment.model';
import { AdapterResult, fail, succeed } from './adapter-result';
import { failureFromError } from './http.client';

export const EXCHANGE_RATE_BASE_URL = 'https://api.exchangerate-api.com/v4';
export const DEFAULT_CURRENCY = 'USD';

const CURRENCY_BY_COUNTRY: ReadonlyMap<string, string> = new Map(Object.entries(countryCurrencies));

// Short keys such as "US" would match inside unrelated names ("Russia").
const MIN_PARTIAL_MATCH_LENGTH = 4;

const ratesSchema = z.object({
  rates: z.record(z.number())
});

/** "Paris, France" -> "France"; "Paris" -> "Paris". */
export const countryFromDestination = (destination: string): string => {
  const parts = destination.split(',');
  return (parts[parts.length - 1] ?? destination).trim();
};

export const getCountryCurrency = (country: string): string => {
  const exact = CURRENCY_BY_COUNTRY.get(country);
  if (exact) {
    return exact;
  }

  const needle = country.trim().toLowerCase();
  if (needle.length >= MIN_PARTIAL_MATCH_LENGTH) {
    for (const [name, currency] of CURRENCY_BY_COUNTRY) {
      const key = name.toLowerCase();
      if (key.length < MIN_PARTIAL_MATCH_LENGTH) continue;
      if (needle.includes(key) || key.includes(needle)) {
        return currency;
      }
    }
  }

  return DEFAULT_CURRENCY;
};

export class CurrencyService {
  constructor(private readonly http: AxiosInstance) {}

  async getExchangeRate(from: string, to: string): Promise<AdapterResult<number>> {
    if (from === to) {
      return succeed(1);
    }

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(`/latest/${encodeURIComponent(from)}`);
      body = response.data;
    } catch (error) {
      return failureFromError('currency', error);
    }

    const parsed = ratesSchema.safeParse(body);
    if (!parsed.success) {
      return fail('currency', 'malformed_response', 'Unexpected exchange rate payload');
    }

    const rate = parsed.data.rates[to];
    if (rate === undefined) {
      return fail('currency', 'not_found', `No ${from} -> ${to} rate`);
    }
    return succeed(rate);
  }

  async getCurrencyInfo(country: string, baseCurrency = DEFAULT_CURRENCY): Promise<AdapterResult<CurrencyInfo>> {
    const localCurrency = getCountryCurrency(country);
    const rate = await this.getExchangeRate(baseCurrency, localCurrency);
    if (!rate.ok) return rate;

    return succeed({
      country,
      localCurrency,
      baseCurrency,
      exchangeRate: rate.data,
      formattedRate: `1 ${baseCurrency} = ${rate.data.toFixed(2)} ${localCurrency}`
    });
  }
}
