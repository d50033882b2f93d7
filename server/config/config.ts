import {
  ConfigSchema,
  normalizeDomain,
  parseLogLevel,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      bodyLimit: env.HTTP_BODY_LIMIT?.trim() || '1mb',
    },
    app: {
      domain: normalizeDomain(env.APP_DOMAIN) || 'localhost:3000',
    },
    cdn: {
      baseUrl: env.CDN_BASE_URL?.trim() || 'https://res.cloudinary.com',
      cloudName: env.CDN_CLOUD_NAME?.trim() || undefined,
      videoThumbnailWidth: numberFromEnv(env.CDN_VIDEO_THUMBNAIL_WIDTH, 880),
      videoThumbnailQuality: numberFromEnv(env.CDN_VIDEO_THUMBNAIL_QUALITY, 80),
    },
    observability: {
      logLevel: parseLogLevel(env.LOG_LEVEL, 'info'),
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
