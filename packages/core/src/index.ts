/**
 * @stagecraft/core - Core library for Stagecraft
 *
 * Provides logging, configuration and the error taxonomy shared by the
 * pipeline compiler and the CLI.
 */

// Logging (Pino-based logger)
export {
  getLogger,
  createLogger,
  resetLogger,
  getContext,
  getContextLogger,
  runPipeline,
  runStep,
  runWithContext,
  isLogLevel,
} from "./logger/index.js";
export type {
  Logger,
  LoggerConfig,
  PipelineContext,
  RotationConfig,
  LogLevel,
} from "./logger/index.js";
export { LogLevels } from "./logger/index.js";

// Errors
export {
  StagecraftError,
  InputError,
  StructuralError,
  ConfigurationError,
  IOError,
  EXIT_CODES,
  exitCodeFor,
  describeError,
} from "./errors/index.js";
export type { ErrorCategory } from "./errors/index.js";

// Configuration
export { loadConfig, loadStagecraftConfig, StagecraftConfigSchema } from "./config/index.js";
export type { StagecraftConfig } from "./config/index.js";
