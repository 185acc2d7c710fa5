export type NodeEnvironment = 'development' | 'production' | 'test';

export interface AppConfig {
  port: number;
  nodeEnv: NodeEnvironment;
  corsOrigin?: string;
  geminiApiKey?: string;
  geminiModel: string;
  googleApiKey?: string;
  openWeatherMapApiKey?: string;
  httpTimeoutMs: number;
  aiTimeoutMs: number;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_HTTP_TIMEOUT_MS = 10000;
export const DEFAULT_AI_TIMEOUT_MS = 60000;

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const positiveInt = (name: string, value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`Ignoring invalid ${name}="${value}", using ${fallback}`);
    return fallback;
  }
  return parsed;
};

const nodeEnvironment = (value: string | undefined): NodeEnvironment => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

/**
 * Builds the process-wide configuration from environment variables.
 * The result is frozen: adapters receive it at startup and only read it.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> =>
  Object.freeze({
    port: positiveInt('PORT', env.PORT, DEFAULT_PORT),
    nodeEnv: nodeEnvironment(env.NODE_ENV),
    corsOrigin: optional(env.CORS_ORIGIN),
    geminiApiKey: optional(env.GEMINI_API_KEY),
    geminiModel: optional(env.GEMINI_MODEL) ?? DEFAULT_GEMINI_MODEL,
    googleApiKey: optional(env.GOOGLE_API_KEY),
    openWeatherMapApiKey: optional(env.OPENWEATHERMAP_API_KEY),
    httpTimeoutMs: positiveInt('HTTP_TIMEOUT_MS', env.HTTP_TIMEOUT_MS, DEFAULT_HTTP_TIMEOUT_MS),
    aiTimeoutMs: positiveInt('AI_TIMEOUT_MS', env.AI_TIMEOUT_MS, DEFAULT_AI_TIMEOUT_MS)
  });
