/**
 * Configuration type definitions with strict validation
 * Using TypeScript's satisfies operator for compile-time validation
 */

import { Environment, LogLevel } from '../shared/enums';

/**
 * Server configuration interface
 */
export interface ServerConfig {
  readonly port: number;
  readonly nodeEnv: `${Environment}`;
}

/**
 * Database configuration interface
 */
export interface DatabaseConfig {
  /** File path of the SQLite database, or `:memory:` */
  readonly path: string;
  readonly sessionPoolSize: number;
}

/**
 * Corporation settings
 */
export interface CorporationConfig {
  readonly corporationId: number;
  /** Undefined until resolved from ESI; 0 means the corporation is independent */
  readonly allianceId: number | undefined;
  readonly localTimezone: string;
  readonly siteName: string;
  readonly startupDate: string;
}

/**
 * APIs configuration interface
 */
export interface ApisConfig {
  readonly esi: {
    readonly baseUrl: string;
    readonly userAgent: string;
    readonly requestsPerSecond: number;
  };
  readonly zkillboard: {
    readonly baseUrl: string;
  };
  readonly images: {
    readonly baseUrl: string;
  };
}

/**
 * HTTP client configuration interface
 */
export interface HttpConfig {
  readonly timeout: number;
  readonly maxRetries: number;
  readonly initialRetryDelay: number;
  readonly maxRetryDelay: number;
  readonly rateLimitedWaitMs: number;
}

/**
 * Reconciliation scheduling
 */
export interface ReconciliationConfig {
  readonly retryDelayMs: number;
}

/**
 * Logging configuration interface
 */
export interface LoggingConfig {
  readonly level: `${LogLevel}`;
}

/**
 * Complete application configuration interface
 */
export interface ApplicationConfig {
  readonly server: ServerConfig;
  readonly database: DatabaseConfig;
  readonly corporation: CorporationConfig;
  readonly apis: ApisConfig;
  readonly http: HttpConfig;
  readonly reconciliation: ReconciliationConfig;
  readonly logging: LoggingConfig;
}

/**
 * Configuration validation constraints
 */
export const ConfigurationConstraints = {
  server: {
    port: { min: 0, max: 65535 },
  },
  database: {
    sessionPoolSize: { min: 1, max: 16 },
  },
  apis: {
    requestsPerSecond: { min: 1, max: 100 },
  },
  http: {
    timeout: { min: 1000, max: 300000 }, // 1s to 5min
    maxRetries: { min: 1, max: 10 },
    initialRetryDelay: { min: 0, max: 60000 },
    maxRetryDelay: { min: 0, max: 300000 },
    rateLimitedWaitMs: { min: 0, max: 600000 },
  },
  reconciliation: {
    retryDelayMs: { min: 0, max: 86400000 }, // up to 24 hours
  },
} as const;
