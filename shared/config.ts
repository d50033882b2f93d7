import { z } from 'zod';

const hostnamePattern = /^[a-z0-9.-]+(:\d{1,5})?$/i;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    bodyLimit: z.string().min(2),
  }),
  app: z.object({
    domain: z.string().min(1).regex(hostnamePattern, 'APP_DOMAIN must be a bare host name'),
  }),
  cdn: z.object({
    baseUrl: z.string().url(),
    cloudName: z.string().optional(),
    videoThumbnailWidth: z.number().int().positive(),
    videoThumbnailQuality: z.number().int().min(1).max(100),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  appDomain: string;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  appDomain: config.app.domain,
});

export const parseLogLevel = (
  value: string | undefined,
  fallback: AppConfig['observability']['logLevel'],
): AppConfig['observability']['logLevel'] => {
  const normalized = (value ?? '').trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return fallback;
  }
};

export const normalizeDomain = (value: string | null | undefined): string =>
  String(value ?? '')
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');
