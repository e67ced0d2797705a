// Load environment variables first
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

const DEV_JWT_SECRET = 'dev-jwt-secret';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  STORAGE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGODB_URI: z.string().min(1).default('mongodb://127.0.0.1:27017/wifi-attendance'),
  JWT_SECRET: z.string().min(1).optional(),
  ROUTER_API_KEY: z.string().min(1).optional(),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  // 0 disables the staleness check on device attachments
  ATTACHMENT_MAX_AGE_SECONDS: z.coerce.number().int().nonnegative().default(300),
});

export type StorageDriver = 'mongo' | 'memory';

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  storageDriver: StorageDriver;
  mongoUri: string;
  jwtSecret: string;
  routerApiKey: string | null;
  lookupTimeoutMs: number;
  attachmentMaxAgeMs: number;
}

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }

  const env = parsed.data;
  if (!env.JWT_SECRET && env.NODE_ENV === 'production') {
    throw new Error('Invalid environment configuration:\n  JWT_SECRET: required in production');
  }
  if (!env.JWT_SECRET && env.NODE_ENV === 'development') {
    console.warn('[Config] JWT_SECRET is not set, falling back to the development secret.');
  }

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    storageDriver: env.STORAGE_DRIVER,
    mongoUri: env.MONGODB_URI,
    jwtSecret: env.JWT_SECRET ?? DEV_JWT_SECRET,
    routerApiKey: env.ROUTER_API_KEY ?? null,
    lookupTimeoutMs: env.LOOKUP_TIMEOUT_MS,
    attachmentMaxAgeMs: env.ATTACHMENT_MAX_AGE_SECONDS * 1000,
  };
};

export const config = loadConfig();
