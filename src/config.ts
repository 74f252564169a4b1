import 'dotenv/config';
import { z } from 'zod';

const DEFAULT_JWT_SECRET = 'dev-secret';

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    DATABASE_PATH: z.string().min(1).default('data/database.sqlite'),
    JWT_SECRET: z.string().min(1).default(DEFAULT_JWT_SECRET),
    // Token lifetime in seconds
    JWT_EXPIRES_IN: z.coerce.number().int().positive().default(24 * 60 * 60),
    CORS_ORIGINS: z.string().default(''),
    DEFAULT_STORAGE_LIMIT: z.coerce.number().int().nonnegative().default(5 * 1024 * 1024 * 1024),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(100 * 1024 * 1024),
    STORAGE_DRIVER: z.enum(['disk', 's3']).default('disk'),
    STORAGE_PATH: z.string().min(1).default('data/blobs'),
    B2_ENDPOINT: z.string().optional(),
    B2_REGION: z.string().optional(),
    B2_KEY_ID: z.string().optional(),
    B2_APP_KEY: z.string().optional(),
    B2_BUCKET: z.string().optional(),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.JWT_SECRET === DEFAULT_JWT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET must be set in production',
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export interface S3Settings {
  endpoint: string;
  region: string;
  keyId: string;
  appKey: string;
  bucket: string;
}

/**
 * Parses and validates the process environment.
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}

export function getS3Settings(cfg: AppConfig): S3Settings | null {
  const { B2_ENDPOINT, B2_REGION, B2_KEY_ID, B2_APP_KEY, B2_BUCKET } = cfg;
  if (!B2_ENDPOINT || !B2_REGION || !B2_KEY_ID || !B2_APP_KEY || !B2_BUCKET) {
    return null;
  }
  return {
    endpoint: B2_ENDPOINT,
    region: B2_REGION,
    keyId: B2_KEY_ID,
    appKey: B2_APP_KEY,
    bucket: B2_BUCKET,
  };
}

export const config = loadConfig();
