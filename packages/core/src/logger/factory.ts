/**
 * File: packages/core/src/logger/factory.ts
 * Purpose: Logger factory with singleton pattern and environment-based configuration
 * Relationships: Core logger creation, used by all components
 * Key Dependencies: pino, pino-pretty (dev), pino-roll (rotation)
 */

import pino, { type Logger, type LoggerOptions, type TransportTargetOptions } from 'pino';
import path from 'node:path';
import { isLogLevel, type LoggerConfig, type LogLevel } from './types.js';

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'name' | 'rotation'>> & {
  name?: string;
  rotation: Required<NonNullable<LoggerConfig['rotation']>>;
};

/**
 * Singleton logger instance
 */
let instance: Logger | null = null;

/**
 * Build transport configuration based on environment and config
 */
function buildTransportConfig(config: ResolvedLoggerConfig): LoggerOptions['transport'] {
  const targets: TransportTargetOptions[] = [];

  // File transport with rotation
  if (config.toFile && config.rotation.enabled) {
    targets.push({
      target: 'pino-roll',
      level: config.level,
      options: {
        file: path.resolve(config.filePath),
        frequency: config.rotation.frequency,
        size: config.rotation.maxSize,
        mkdir: true,
        symlink: true,
        limit: { count: config.rotation.retention }
      }
    });
  }

  // Console transport (pretty or JSON). Logs go to stderr so that
  // `--stdout` output stays a clean pipeline document.
  if (config.pretty) {
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
        destination: 2
      }
    });
  } else {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: {
        destination: 2
      }
    });
  }

  if (targets.length > 1) {
    return { targets };
  }
  return targets[0];
}

/**
 * Resolve configuration from environment and provided config
 */
function resolveConfig(config?: LoggerConfig): ResolvedLoggerConfig {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const isTest = process.env.NODE_ENV === 'test';
  const envLevel = process.env.LOG_LEVEL;
  const fallbackLevel: LogLevel = isDevelopment ? 'debug' : 'info';

  return {
    level: config?.level ?? (isLogLevel(envLevel) ? envLevel : fallbackLevel),
    toFile: config?.toFile ?? (process.env.LOG_TO_FILE === 'true'),
    filePath: config?.filePath || process.env.LOG_FILE_PATH || './logs/stagecraft.log',
    pretty: config?.pretty ?? (isDevelopment && !process.env.CI),
    rotation: {
      enabled: config?.rotation?.enabled ?? true,
      frequency: config?.rotation?.frequency || 'daily',
      maxSize: config?.rotation?.maxSize || '50m',
      retention: config?.rotation?.retention || 14
    },
    name: config?.name,
    enabled: config?.enabled ?? !isTest
  };
}

/**
 * Create a new logger with custom configuration
 *
 * Does not affect the singleton instance. Use for testing or
 * specialized logging scenarios.
 *
 * @example
 * ```typescript
 * const testLogger = createLogger({ enabled: false });
 * const debugLogger = createLogger({ level: 'debug', pretty: true });
 * ```
 */
export function createLogger(config?: LoggerConfig): Logger {
  const resolvedConfig = resolveConfig(config);

  // Test mode: silent logging
  if (!resolvedConfig.enabled) {
    return pino({ level: 'silent', enabled: false });
  }

  const options: LoggerOptions = {
    level: resolvedConfig.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: buildTransportConfig(resolvedConfig)
  };

  if (resolvedConfig.name !== undefined) {
    options.name = resolvedConfig.name;
  }

  return pino(options);
}

/**
 * Get the singleton logger instance
 *
 * Lazily creates logger on first call using environment configuration.
 * Subsequent calls return the same instance.
 *
 * @param config - Optional configuration (only used on first call)
 *
 * @example
 * ```typescript
 * const logger = getLogger();
 * logger.info({ jobs: 12 }, 'Pipeline compiled');
 * logger.error({ err }, 'Generation failed');
 * ```
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!instance) {
    instance = createLogger(config);
  }
  return instance;
}

/**
 * Reset the singleton logger instance
 *
 * Primarily for testing. Clears the singleton so the next call to
 * getLogger() will create a fresh instance.
 */
export function resetLogger(): void {
  instance = null;
}
