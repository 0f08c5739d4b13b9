/**
 * Environment configuration for CLI commands
 */

import { ZodError } from "zod";
import {
  ConfigurationError,
  loadStagecraftConfig,
  type LoggerConfig,
  type StagecraftConfig,
} from "@stagecraft/core";

/**
 * Load environment configuration, reporting invalid values as a configuration error
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): StagecraftConfig {
  try {
    return loadStagecraftConfig(env);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Logger settings taken from the environment configuration
 */
export function loggerConfigFor(config: StagecraftConfig): LoggerConfig {
  return { level: config.logLevel };
}

/**
 * Parse repeated `KEY=VALUE` flags into a variables map
 *
 * @throws {ConfigurationError} An entry has no `=` or an empty key
 */
export function parseVariableAssignments(assignments: readonly string[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new ConfigurationError(`Expected KEY=VALUE, got "${assignment}"`);
    }
    variables[assignment.slice(0, separator)] = assignment.slice(separator + 1);
  }
  return variables;
}
