import { ConfigSchema, DEFAULT_ALLOWED_ORIGINS, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';
import { DEFAULT_MAX_CONTENT_LENGTH, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../retrieval/fetcher';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const buildConfig = (): AppConfig => {
  const environment = (process.env.NODE_ENV || 'development').trim().toLowerCase();
  const allowedOrigins = csvFromEnv(process.env.ALLOWED_ORIGINS);

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(process.env.PORT, 8000),
      allowedOrigins: allowedOrigins.length ? allowedOrigins : DEFAULT_ALLOWED_ORIGINS,
    },
    unfurl: {
      timeoutMs: numberFromEnv(process.env.UNFURL_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
      maxContentLength: numberFromEnv(process.env.UNFURL_MAX_CONTENT_LENGTH, DEFAULT_MAX_CONTENT_LENGTH),
      userAgent: process.env.UNFURL_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      blockPrivateHosts: booleanFromEnv(process.env.UNFURL_BLOCK_PRIVATE_HOSTS, true),
    },
    observability: {
      logLevel: (process.env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
