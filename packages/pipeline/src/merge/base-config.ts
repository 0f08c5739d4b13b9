/**
 * Base configuration loading
 *
 * Reads the parent pipeline file and extracts the `default` block and the
 * trigger job's `variables`. A missing file and a malformed file are
 * reported as different errors; an empty file is a valid, empty config.
 */

import { parse as parseYaml } from "yaml";
import { describeError, getContextLogger } from "@stagecraft/core";
import { ConfigurationNotFoundError, ConfigurationParseError } from "../errors/index.js";
import { fileExists, readTextFile } from "../document/index.js";
import {
  DefaultsBlockSchema,
  TriggerJobSchema,
  formatIssues,
  type BaseConfig,
} from "../schemas/index.js";
import { isRecord } from "../utils/index.js";

export const DEFAULT_TRIGGER_JOB = "execute_builds";

export interface BaseConfigOptions {
  /** Job whose `variables` are handed to the child pipeline */
  triggerJob?: string;
}

/**
 * Extract a base configuration from parent pipeline text
 *
 * @throws {ConfigurationParseError} Invalid YAML, non-mapping top level, or invalid section
 */
export function parseBaseConfig(
  text: string,
  source: string,
  options: BaseConfigOptions = {}
): BaseConfig {
  const triggerJob = options.triggerJob ?? DEFAULT_TRIGGER_JOB;

  let data: unknown;
  try {
    // Parent pipelines often use CI-specific tags (e.g. !reference); those only warn.
    // `<<: *anchor` merge keys are resolved, as CI runners do.
    data = parseYaml(text, { merge: true, logLevel: "error" });
  } catch (error) {
    throw new ConfigurationParseError(source, [describeError(error)], { cause: error });
  }

  if (data === null || data === undefined) {
    return { defaults: {}, variables: {} };
  }
  if (!isRecord(data)) {
    throw new ConfigurationParseError(source, ["top level must be a mapping"]);
  }

  const issues: string[] = [];

  const defaults = DefaultsBlockSchema.safeParse(data.default ?? {});
  if (!defaults.success) {
    issues.push(...formatIssues(defaults.error, "default"));
  }

  const trigger = TriggerJobSchema.safeParse(data[triggerJob] ?? {});
  if (!trigger.success) {
    issues.push(...formatIssues(trigger.error, triggerJob));
  }

  if (!defaults.success || !trigger.success) {
    throw new ConfigurationParseError(source, issues);
  }

  if (data[triggerJob] === undefined) {
    getContextLogger().warn({ source, triggerJob }, "Trigger job not found; no variables handed down");
  }

  return {
    defaults: defaults.data,
    variables: trigger.data.variables ?? {},
  };
}

/**
 * Load the base configuration from a file
 *
 * @throws {ConfigurationNotFoundError} No file at `path`
 * @throws {ConfigurationParseError} The file cannot be used
 * @throws {IOError} The file exists but cannot be read
 */
export function loadBaseConfig(path: string, options: BaseConfigOptions = {}): BaseConfig {
  if (!fileExists(path)) {
    throw new ConfigurationNotFoundError(path);
  }

  const config = parseBaseConfig(readTextFile(path), path, options);
  getContextLogger().info(
    {
      path,
      defaults: Object.keys(config.defaults),
      variables: Object.keys(config.variables).length,
    },
    "Loaded base configuration"
  );
  return config;
}
