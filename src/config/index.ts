export * from './validated';

export type {
  ApplicationConfig,
  ServerConfig,
  DatabaseConfig,
  CorporationConfig,
  ApisConfig,
  HttpConfig,
  ReconciliationConfig,
  LoggingConfig,
} from './types';

export { ConfigurationConstraints } from './types';
