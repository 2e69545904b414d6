import { z } from 'zod';

export const DEV_JWT_SECRET = 'dev-only-secret-change-me';

// jose duration strings, e.g. "60m", "7d"
const durationSchema = z.string().regex(/^\d+\s*(s|m|h|d|w)$/, 'Expected a duration such as 60m or 7d');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  API_PORT: z.coerce.number().int().positive().default(3001),
  API_HOST: z.string().default('0.0.0.0'),
  DATABASE_URL: z.string().default('./data/smart-recipe.db'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  JWT_SECRET: z.string().min(1).default(DEV_JWT_SECRET),
  ACCESS_TOKEN_TTL: durationSchema.default('60m'),
  REFRESH_TOKEN_TTL: durationSchema.default('7d'),
  MEDIA_ROOT: z.string().default('./media'),
  MEDIA_URL: z
    .string()
    .default('/media/')
    .transform((url) => (url.endsWith('/') ? url : `${url}/`)),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  isProd: boolean;
  isDev: boolean;
  port: number;
  host: string;
  databaseUrl: string;
  logLevel: string | undefined;
  jwtSecret: string;
  accessTokenTtl: string;
  refreshTokenTtl: string;
  mediaRoot: string;
  mediaUrl: string;
  uploadMaxBytes: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    isProd: env.NODE_ENV === 'production',
    isDev: env.NODE_ENV === 'development',
    port: env.API_PORT,
    host: env.API_HOST,
    databaseUrl: env.DATABASE_URL,
    logLevel: env.LOG_LEVEL,
    jwtSecret: env.JWT_SECRET,
    accessTokenTtl: env.ACCESS_TOKEN_TTL,
    refreshTokenTtl: env.REFRESH_TOKEN_TTL,
    mediaRoot: env.MEDIA_ROOT,
    mediaUrl: env.MEDIA_URL,
    uploadMaxBytes: env.UPLOAD_MAX_BYTES,
  };
}
