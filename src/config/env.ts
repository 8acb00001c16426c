import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

// Secret files are mounted at /etc/secrets/ in deployment; local runs use the working directory
const possiblePaths = [
  '/etc/secrets/.env',
  resolve(process.cwd(), '.env'),
];

export function loadDotenv(paths: string[] = possiblePaths): string | null {
  for (const envPath of paths) {
    if (!existsSync(envPath)) {
      continue;
    }
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      console.log(`Failed to load ${envPath}:`, result.error.message);
      continue;
    }
    return envPath;
  }
  return null;
}

const integer = (fallback: string) =>
  z.string().regex(/^\d+$/).default(fallback).transform(Number);

const flag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((v) => v === 'true');

const idList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  );

export const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),

  // Community platform
  COMMUNITY_API_TOKEN: z.string().min(1),
  COMMUNITY_API_BASE_URL: z.string().url().default('https://discord.com/api/v10'),
  NOTIFICATION_TARGET_ID: z.string().regex(/^\d+$/),
  EVENT_STREAM_ENABLED: flag('true'),
  HEURISTIC_ON_EVENT_STREAM: flag('false'),
  EXCLUDED_COMMUNITY_IDS: idList,

  // Heuristic detection
  POLL_INTERVAL_SECONDS: integer('60'),
  DISCOVERY_INTERVAL_MINUTES: integer('10'),
  HEARTBEAT_STALE_SECONDS: integer('300'),
  ACTIVITY_MAX_CHANNELS: integer('3'),
  ACTIVITY_MESSAGE_LIMIT: integer('50'),
  ACTIVITY_LOOKBACK_SECONDS: integer('600'),
  NEW_ACCOUNT_MAX_AGE_DAYS: integer('7'),
  DETECTION_STATE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),

  // Deduplication and delivery
  DEDUP_WINDOW_HOURS: integer('24'),
  RATE_BUDGET_CAPACITY: integer('5'),
  RATE_BUDGET_REFILL_AMOUNT: integer('1'),
  RATE_BUDGET_REFILL_INTERVAL_MS: integer('1000'),
  DISPATCH_TOKEN_DEADLINE_MS: integer('10000'),
  DISPATCH_MAX_ATTEMPTS: integer('5').refine((n) => n >= 2, {
    message: 'DISPATCH_MAX_ATTEMPTS must allow at least one retry',
  }),
  DISPATCH_RETRY_BASE_MS: integer('30000'),
  DISPATCH_RETRY_MAX_MS: integer('1800000'),
  RETRY_SWEEP_SECONDS: integer('15'),
  RETENTION_DAYS: integer('90'),

  // Message content and filters
  MESSAGE_FORMAT: z.enum(['basic', 'detailed']).default('basic'),
  IGNORE_BOTS: flag('true'),
  MIN_ACCOUNT_AGE_DAYS: integer('0'),
  NOTIFY_DELIVERY_FAILURES: flag('true'),

  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
}).refine(
  (data) => data.DISPATCH_RETRY_BASE_MS <= data.DISPATCH_RETRY_MAX_MS,
  {
    message: 'DISPATCH_RETRY_BASE_MS cannot exceed DISPATCH_RETRY_MAX_MS',
    path: ['DISPATCH_RETRY_BASE_MS'],
  }
);

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Throws z.ZodError when a variable is missing or malformed.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

let cachedEnv: Env | null = null;

export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const loadedFrom = loadDotenv();
  if (!loadedFrom) {
    console.log('No .env file found - using process environment variables only');
  }

  try {
    cachedEnv = parseEnv(process.env);
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Environment validation failed:');
      error.errors.forEach((err) => {
        const varName = err.path.join('.');
        console.error(`  - ${varName}: ${err.message}`);
      });
      console.error('\nExpected configuration:');
      console.error('    - DATABASE_URL');
      console.error('    - COMMUNITY_API_TOKEN');
      console.error('    - NOTIFICATION_TARGET_ID');
      console.error('\nSee .env.example for the optional tuning variables.\n');
      process.exit(1);
    }
    throw error;
  }
}
