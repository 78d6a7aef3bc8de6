import pino, { LoggerOptions } from 'pino';
import { ValidatedConfiguration } from '../config/validated';

const logLevel = ValidatedConfiguration.logging.level;

// Create base logger configuration
const baseConfig: LoggerOptions = {
  level: logLevel,
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

// Development configuration with pretty printing
const devConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  },
};

// Production configuration (JSON format)
const prodConfig: LoggerOptions = {
  ...baseConfig,
  timestamp: pino.stdTimeFunctions.isoTime,
};

const logger = pino(ValidatedConfiguration.server.nodeEnv === 'production' ? prodConfig : devConfig);

// Create child logger with context
export function createLogger(context: string): Logger {
  return logger.child({ context });
}

export type Logger = pino.Logger;
export { logger };
