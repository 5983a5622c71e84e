/**
 * Logger module wrapping pino.
 * Provides child loggers per module with automatic redaction of credentials.
 */

import { pino, type DestinationStream, type Logger } from 'pino';

export const REDACT_PATHS = [
  'authorization', 'apiKey', 'api_key', 'token', 'secret',
  '*.authorization', '*.apiKey', '*.api_key', '*.token', '*.secret',
  'headers.authorization',
];

/**
 * Create a root logger.
 * Writes through pino-pretty outside production and test unless a
 * destination is given.
 */
export function createLogger(destination?: DestinationStream): Logger {
  const level = process.env.LOG_LEVEL ?? process.env.QUOTA_GATE_LOG_LEVEL ?? 'info';
  const options = {
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  const env = process.env.NODE_ENV;
  const transport = env !== 'production' && env !== 'test'
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined;

  return pino({ ...options, transport });
}

/** Root logger instance */
export const logger = createLogger();

/** Create a child logger for a specific module */
export function createModuleLogger(moduleName: string): Logger {
  return logger.child({ module: moduleName });
}

/** Pre-built module loggers for core subsystems */
export const pricingLogger = createModuleLogger('pricing');
export const ledgerLogger = createModuleLogger('ledger');
export const admissionLogger = createModuleLogger('admission');
export const gatewayLogger = createModuleLogger('gateway');
export const upstreamLogger = createModuleLogger('upstream');
