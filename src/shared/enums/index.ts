/**
 * Centralized enum definitions for commonly used string literals
 */

// Log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

// Environment types
export enum Environment {
  DEVELOPMENT = 'development',
  STAGING = 'staging',
  PRODUCTION = 'production',
  TEST = 'test',
}

// Player kinds
export enum PlayerKind {
  REGULAR = 'regular',
  SENTINEL = 'sentinel',
}

// Monthly workbook sheets
export enum SheetKind {
  ACTIVITY = 'activity',
  BOUNTY = 'bounty',
  MINING = 'mining',
}

// Outcome of reconciling one record
export enum ReconcileOutcome {
  FIXED = 'fixed',
  FAILED = 'failed',
  DELETED = 'deleted',
}

// Persisted system state keys
export enum SystemStateKey {
  LATEST_UPDATE = 'latest_update',
  SDE_VERSION = 'sde_version',
}

// Persisted id sequences
export enum IdSequenceName {
  PLACEHOLDER_CHARACTER = 'placeholder_character',
  CHARACTER_INSERTION = 'character_insertion',
}
