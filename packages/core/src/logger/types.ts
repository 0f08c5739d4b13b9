/**
 * File: packages/core/src/logger/types.ts
 * Purpose: Type definitions for the Stagecraft logging system
 * Relationships: Used by factory.ts, context.ts, and all components using logger
 * Key Dependencies: pino
 */

import type { Logger as PinoLogger, LoggerOptions, Bindings } from 'pino';

/**
 * Supported log levels (ordered by severity)
 */
export type LogLevel =
  | 'trace'   // Most verbose, diagnostic info
  | 'debug'   // Debugging information
  | 'info'    // General operational messages
  | 'warn'    // Warning conditions
  | 'error'   // Error conditions
  | 'fatal';  // Critical failures

/**
 * Numeric log levels (Pino internal)
 */
export const LogLevels = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60
} as const;

/**
 * Narrow an arbitrary string (usually from the environment) to a LogLevel
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LogLevels, value);
}

/**
 * File rotation settings
 */
export interface RotationConfig {
  /**
   * Enable log rotation
   * @default true (when toFile=true)
   */
  enabled?: boolean;

  /**
   * Rotation frequency
   * @default 'daily'
   */
  frequency?: 'daily' | 'hourly';

  /**
   * Maximum file size before rotation
   * Examples: '50m', '100m', '1g'
   * @default '50m'
   */
  maxSize?: string;

  /**
   * Number of rotated files to retain
   * @default 14
   */
  retention?: number;
}

/**
 * Configuration for logger creation
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default 'info' (production), 'debug' (development)
   */
  level?: LogLevel;

  /**
   * Enable file logging
   * @default false
   */
  toFile?: boolean;

  /**
   * Path to log file
   * @default './logs/stagecraft.log'
   */
  filePath?: string;

  /**
   * Enable pretty-printing for development
   * @default true (development), false (production)
   */
  pretty?: boolean;

  /**
   * Log rotation configuration
   */
  rotation?: RotationConfig;

  /**
   * Custom logger name
   */
  name?: string;

  /**
   * Enable logger (for testing)
   * @default true, false under NODE_ENV=test
   */
  enabled?: boolean;
}

/**
 * Correlation context for one generate/inject invocation
 */
export interface PipelineContext {
  /**
   * Unique identifier for the invocation
   * Format: 'generate-{timestamp}' or 'inject-{timestamp}'
   */
  runId: string;

  /**
   * Current step name (optional)
   * Examples: 'compile', 'merge', 'write'
   */
  step?: string;
}

/**
 * Re-export Pino types
 */
export type Logger = PinoLogger;
export type { LoggerOptions, Bindings };
