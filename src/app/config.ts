/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Read once at startup; nothing re-reads process.env afterwards.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In Lambda/containers the platform injects env vars (no file).
 *
 * TYPING:
 * - storeDriver is a union so di.ts can switch on it exhaustively.
 * - Driver-specific settings are required only for the driver that needs them
 *   (AWS_REGION for dynamodb, REDIS_URL for redis); checked here, not at first request.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const StoreDriverSchema = z.enum(['dynamodb', 'redis', 'memory']).default('dynamodb');

// z.coerce.boolean() treats "false" as true; accept the two literal strings only.
const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('user-crud-service'),

    // Store
    USER_STORE_DRIVER: StoreDriverSchema,
    TABLE_NAME: z.string().min(1),
    AWS_REGION: z.string().min(1).optional(),
    DYNAMODB_ENDPOINT: z.string().url().optional(),
    REDIS_URL: z.string().min(1).optional(),
    USER_CONDITIONAL_WRITES: BooleanFlagSchema,
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE_DRIVER === 'dynamodb' && !env.AWS_REGION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AWS_REGION'],
        message: 'AWS_REGION is required when USER_STORE_DRIVER=dynamodb',
      });
    }
    if (env.USER_STORE_DRIVER === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when USER_STORE_DRIVER=redis',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type StoreDriver = z.infer<typeof StoreDriverSchema>;

export type StoreConfig =
  | { driver: 'dynamodb'; tableName: string; region: string; endpoint?: string }
  | { driver: 'redis'; tableName: string; redisUrl: string }
  | { driver: 'memory'; tableName: string };

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  store: StoreConfig;
  conditionalWrites: boolean;
};

function buildStoreConfig(parsed: z.infer<typeof ConfigSchema>): StoreConfig {
  const tableName = parsed.TABLE_NAME;

  switch (parsed.USER_STORE_DRIVER) {
    case 'dynamodb':
      return {
        driver: 'dynamodb',
        tableName,
        // presence enforced by superRefine
        region: parsed.AWS_REGION ?? '',
        endpoint: parsed.DYNAMODB_ENDPOINT,
      };
    case 'redis':
      return { driver: 'redis', tableName, redisUrl: parsed.REDIS_URL ?? '' };
    case 'memory':
      return { driver: 'memory', tableName };
  }
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    store: buildStoreConfig(parsed),
    conditionalWrites: parsed.USER_CONDITIONAL_WRITES,
  };
}
