/**
 * File: packages/core/src/logger/index.ts
 * Purpose: Public API exports for the Stagecraft logging system
 * Relationships: Entry point for all logger functionality
 * Key Dependencies: factory.ts, context.ts, types.ts
 */

// Logger factory functions
export { getLogger, createLogger, resetLogger } from './factory.js';

// Context management functions
export {
  getContext,
  getContextLogger,
  runPipeline,
  runStep,
  runWithContext
} from './context.js';

// Type exports
export type {
  Logger,
  LoggerOptions,
  Bindings,
  LogLevel,
  LoggerConfig,
  PipelineContext,
  RotationConfig
} from './types.js';

export { LogLevels, isLogLevel } from './types.js';
