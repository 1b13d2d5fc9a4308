/**
 * Environment configuration
 *
 * Parsed once at process start and passed down explicitly.
 * Nothing below src/modules reads process.env directly.
 */

import { z } from 'zod';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const hours = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CORS_ORIGINS: z.string().default('http://localhost:8000'),

    STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
    MONGO_URL: optionalString,
    DB_NAME: z.string().min(1).default('flare_forecast'),
    DATA_TABLE_NAME: z.string().min(1).default('observation_data'),
    PREDICTION_TABLE_NAME: z.string().min(1).default('model_predictions'),

    ML_LOOKBACK_HOURS: hours(72),
    DATA_RETRIEVAL_HOURS: hours(72),
    BUFFER_HOURS: z.coerce.number().int().min(0).default(1),
    DEFAULT_REQUEST_HOURS: hours(72),
    MAX_REQUEST_HOURS: hours(168),

    GOES_FEED_BASE_URL: z.string().url().default('https://services.swpc.noaa.gov/json/goes/primary'),
    GOES_ENERGY_CHANNEL: z.string().min(1).default('0.1-0.8nm'),
    FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    MODEL_ARTIFACT_PATH: optionalString,

    SCHEDULER_AUTH_MODE: z.enum(['allow', 'secret', 'oidc']).default('allow'),
    SCHEDULER_SECRET: optionalString,
    SCHEDULER_OIDC_ISSUER: optionalString,
    SCHEDULER_OIDC_AUDIENCE: optionalString,
    SCHEDULER_OIDC_JWKS_URL: z.string().url().default('https://www.googleapis.com/oauth2/v3/certs'),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === 'mongo' && !env.MONGO_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MONGO_URL'], message: 'required when STORE_DRIVER=mongo' });
    }
    if (env.DEFAULT_REQUEST_HOURS > env.MAX_REQUEST_HOURS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DEFAULT_REQUEST_HOURS'],
        message: 'must not exceed MAX_REQUEST_HOURS',
      });
    }
    if (env.SCHEDULER_AUTH_MODE === 'secret' && !env.SCHEDULER_SECRET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SCHEDULER_SECRET'], message: 'required when SCHEDULER_AUTH_MODE=secret' });
    }
    if (env.SCHEDULER_AUTH_MODE === 'oidc') {
      for (const key of ['SCHEDULER_OIDC_ISSUER', 'SCHEDULER_OIDC_AUDIENCE'] as const) {
        if (!env[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'required when SCHEDULER_AUTH_MODE=oidc' });
        }
      }
    }
  });

export type RawEnv = z.infer<typeof EnvSchema>;

export type SchedulerAuthConfig =
  | { mode: 'allow' }
  | { mode: 'secret'; secret: string }
  | { mode: 'oidc'; issuer: string; audience: string; jwksUrl: string };

export type StoreConfig =
  | { driver: 'memory' }
  | { driver: 'mongo'; url: string; dbName: string };

export interface AppConfig {
  nodeEnv: RawEnv['NODE_ENV'];
  port: number;
  logLevel: RawEnv['LOG_LEVEL'];
  corsOrigins: true | string[];

  store: StoreConfig;
  tables: {
    observations: string;
    predictions: string;
  };

  pipeline: {
    modelLookbackHours: number;
    maxRetrievalHours: number;
    bufferHours: number;
  };

  requests: {
    defaultHours: number;
    maxHours: number;
  };

  feed: {
    baseUrl: string;
    energyChannel: string;
    timeoutMs: number;
  };

  model: {
    artifactPath: string | null;
  };

  schedulerAuth: SchedulerAuthConfig;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

function toSchedulerAuth(env: RawEnv): SchedulerAuthConfig {
  switch (env.SCHEDULER_AUTH_MODE) {
    case 'secret':
      return { mode: 'secret', secret: env.SCHEDULER_SECRET ?? '' };
    case 'oidc':
      return {
        mode: 'oidc',
        issuer: env.SCHEDULER_OIDC_ISSUER ?? '',
        audience: env.SCHEDULER_OIDC_AUDIENCE ?? '',
        jwksUrl: env.SCHEDULER_OIDC_JWKS_URL,
      };
    default:
      return { mode: 'allow' };
  }
}

/**
 * Validate an environment map into the application config.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  const env = parsed.data;
  const corsOrigins =
    env.CORS_ORIGINS.trim() === '*'
      ? true
      : env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    corsOrigins,
    store:
      env.STORE_DRIVER === 'mongo'
        ? { driver: 'mongo', url: env.MONGO_URL ?? '', dbName: env.DB_NAME }
        : { driver: 'memory' },
    tables: {
      observations: env.DATA_TABLE_NAME,
      predictions: env.PREDICTION_TABLE_NAME,
    },
    pipeline: {
      modelLookbackHours: env.ML_LOOKBACK_HOURS,
      maxRetrievalHours: env.DATA_RETRIEVAL_HOURS,
      bufferHours: env.BUFFER_HOURS,
    },
    requests: {
      defaultHours: env.DEFAULT_REQUEST_HOURS,
      maxHours: env.MAX_REQUEST_HOURS,
    },
    feed: {
      baseUrl: env.GOES_FEED_BASE_URL.replace(/\/+$/, ''),
      energyChannel: env.GOES_ENERGY_CHANNEL,
      timeoutMs: env.FEED_TIMEOUT_MS,
    },
    model: {
      artifactPath: env.MODEL_ARTIFACT_PATH ?? null,
    },
    schedulerAuth: toSchedulerAuth(env),
  };
}
