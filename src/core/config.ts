/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * I funnel every tunable setting (HTTP timeout, worker pool size, pacing,
 * provider endpoints, output directory) through this file so there's one place
 * to look and one place to validate. Every other module imports `config`
 * instead of reading process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "30000" → 30000) at startup. If anything is invalid, the process exits
 * immediately with the tree of issues. The result is a nested `config` object
 * exported with `as const`.
 *
 * API keys are not read here: they come from CLI flags so a run
 * can compare keys from different projects without touching the environment.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Per-call timeout; a timed-out call is recorded as status TIMEOUT. */
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),

  /** Rows in flight at once. Each row issues two HTTP calls, so in-flight calls ≤ 2× this. */
  COMPARE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  /** Pause each worker takes between rows, to stay under provider rate limits. */
  ROW_DELAY_MS: z.coerce.number().int().min(0).default(100),
  PROGRESS_INTERVAL: z.coerce.number().int().min(1).default(25),

  LANGUAGE_CODE: z.string().min(2).default('en-US'),
  OUTPUT_DIR: z.string().default('.'),

  DIRECTIONS_API_URL: z.url().default('https://maps.googleapis.com/maps/api/directions/json'),
  ROUTES_API_URL: z.url().default('https://routes.googleapis.com/directions/v2:computeRoutes'),
  /** Fields requested from the Routes API (sent as X-Goog-FieldMask). */
  ROUTES_FIELD_MASK: z
    .string()
    .min(1)
    .default(
      'routes.distanceMeters,routes.duration,routes.polyline.encodedPolyline,routes.localizedValues,routes.legs.startLocation,routes.legs.endLocation',
    ),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  http: {
    timeoutMs: env.HTTP_TIMEOUT_MS,
    languageCode: env.LANGUAGE_CODE,
  },

  providers: {
    directions: {
      url: env.DIRECTIONS_API_URL,
    },
    routes: {
      url: env.ROUTES_API_URL,
      fieldMask: env.ROUTES_FIELD_MASK,
    },
  },

  batch: {
    concurrency: env.COMPARE_CONCURRENCY,
    rowDelayMs: env.ROW_DELAY_MS,
    progressInterval: env.PROGRESS_INTERVAL,
  },

  output: {
    dir: env.OUTPUT_DIR,
  },
} as const;

export type AppConfig = typeof config;
