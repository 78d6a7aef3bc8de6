/**
 * Type-safe validated configuration
 */

import 'dotenv/config';
import { Environment, LogLevel } from '../shared/enums';
import type { ApplicationConfig } from './types';
import { ConfigurationConstraints } from './types';

/**
 * Parse environment variable as number with validation
 */
function parseNumber(
  envVar: string | undefined,
  defaultValue: number,
  constraints?: { min: number; max: number }
): number {
  const value = envVar ? Number(envVar) : defaultValue;

  if (isNaN(value)) {
    console.warn(`Invalid number value for environment variable: ${envVar}`);
    return defaultValue;
  }

  if (constraints) {
    if (value < constraints.min || value > constraints.max) {
      console.warn(`Value ${value} is outside constraints [${constraints.min}, ${constraints.max}]`);
      return defaultValue;
    }
  }

  return value;
}

/**
 * Parse an optional numeric environment variable; blank means unset
 */
function parseOptionalNumber(envVar: string | undefined): number | undefined {
  if (envVar === undefined || envVar.trim() === '') return undefined;
  const value = Number(envVar);
  if (isNaN(value)) {
    console.warn(`Invalid number value for environment variable: ${envVar}`);
    return undefined;
  }
  return value;
}

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);
const ENVIRONMENTS: readonly string[] = Object.values(Environment);

function isLogLevel(level: string): level is `${LogLevel}` {
  return LOG_LEVELS.includes(level);
}

function isEnvironment(env: string): env is `${Environment}` {
  return ENVIRONMENTS.includes(env);
}

/**
 * Validate log level
 */
function validateLogLevel(level: string): `${LogLevel}` {
  if (isLogLevel(level)) {
    return level;
  }

  console.warn(`Invalid log level: ${level}, defaulting to 'info'`);
  return LogLevel.INFO;
}

/**
 * Validate environment
 */
function validateEnvironment(env: string): `${Environment}` {
  if (isEnvironment(env)) {
    return env;
  }

  console.warn(`Invalid environment: ${env}, defaulting to 'development'`);
  return Environment.DEVELOPMENT;
}

export const ValidatedConfiguration = {
  server: {
    port: parseNumber(process.env.PORT, 3000, ConfigurationConstraints.server.port),
    nodeEnv: validateEnvironment(process.env.NODE_ENV ?? 'development'),
  },
  database: {
    path: process.env.DATABASE_PATH ?? 'instance/database.db',
    sessionPoolSize: parseNumber(
      process.env.SESSION_POOL_SIZE,
      3,
      ConfigurationConstraints.database.sessionPoolSize
    ),
  },
  corporation: {
    corporationId: parseNumber(process.env.CORPORATION_ID, 0),
    allianceId: parseOptionalNumber(process.env.ALLIANCE_ID),
    localTimezone: process.env.LOCAL_TIMEZONE ?? 'Asia/Shanghai',
    siteName: process.env.SITE_NAME ?? 'EVE Corp KM Stats',
    startupDate: process.env.STARTUP_DATE ?? '2024-01-01',
  },
  apis: {
    esi: {
      baseUrl: process.env.ESI_BASE_URL ?? 'https://esi.evetech.net/latest',
      userAgent: process.env.ESI_USER_AGENT ?? 'corp-ledger/1.0',
      requestsPerSecond: parseNumber(
        process.env.ESI_REQUESTS_PER_SECOND,
        10,
        ConfigurationConstraints.apis.requestsPerSecond
      ),
    },
    zkillboard: {
      baseUrl: process.env.ZKILLBOARD_BASE_URL ?? 'https://zkillboard.com/api',
    },
    images: {
      baseUrl: process.env.IMAGE_BASE_URL ?? 'https://images.evetech.net',
    },
  },
  http: {
    timeout: parseNumber(process.env.HTTP_TIMEOUT, 30000, ConfigurationConstraints.http.timeout),
    maxRetries: parseNumber(process.env.HTTP_MAX_RETRIES, 3, ConfigurationConstraints.http.maxRetries),
    initialRetryDelay: parseNumber(
      process.env.HTTP_INITIAL_RETRY_DELAY,
      1000,
      ConfigurationConstraints.http.initialRetryDelay
    ),
    maxRetryDelay: parseNumber(process.env.HTTP_MAX_RETRY_DELAY, 45000, ConfigurationConstraints.http.maxRetryDelay),
    rateLimitedWaitMs: parseNumber(
      process.env.RATE_LIMITED_WAIT_MS,
      60000,
      ConfigurationConstraints.http.rateLimitedWaitMs
    ),
  },
  reconciliation: {
    retryDelayMs: parseNumber(
      process.env.RECONCILE_RETRY_DELAY_MS,
      5 * 60 * 1000,
      ConfigurationConstraints.reconciliation.retryDelayMs
    ),
  },
  logging: {
    level: validateLogLevel(process.env.LOG_LEVEL ?? 'info'),
  },
} as const satisfies ApplicationConfig;

export type ValidatedConfig = typeof ValidatedConfiguration;
