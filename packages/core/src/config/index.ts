/**
 * Configuration management for Stagecraft
 */

import { z } from "zod";

const booleanFromEnv = (value: string): boolean =>
  ["1", "true", "yes"].includes(value.trim().toLowerCase());

/**
 * Configuration schema for pipeline generation. Every key can be
 * overridden by a CLI flag; these are the environment-level defaults.
 */
export const StagecraftConfigSchema = z.object({
  /** Log level */
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),

  /** Base configuration document (the parent pipeline file) */
  baseConfigPath: z.string().min(1).default(".gitlab-ci.yml"),

  /** Job in the base configuration whose variables are handed to the child pipeline */
  triggerJob: z.string().min(1).default("execute_builds"),

  /** Where the generated child pipeline is written */
  outputPath: z.string().min(1).default("ci-child-pipeline.yml"),

  /** Base directory for build logs collected as artifacts */
  logDir: z.string().min(1).default("/tmp/eblog"),

  /** Base directory for build trees whose logs are collected as artifacts */
  buildDir: z.string().min(1).default("/tmp/ebbuild"),

  /** Build tool each job invokes */
  buildExecutable: z.string().min(1).default("eb"),

  /** Cores requested per job */
  cores: z.number().int().positive().default(1),

  /** Walltime per job, in hours */
  walltimeHours: z.number().int().positive().default(24),

  /** GPU compute capabilities exported to every job */
  computeCapabilities: z.array(z.string().min(1)).optional(),

  /** Append --dry-run to every build command */
  dryRun: z.boolean().default(false),

  /** Whether hidden dependencies gate job ordering */
  hiddenGatesOrdering: z.boolean().default(true),
});

export type StagecraftConfig = z.infer<typeof StagecraftConfigSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): z.infer<T> {
  // Map environment variables to config object
  const configFromEnv: Record<string, unknown> = {};

  if (env.LOG_LEVEL) configFromEnv.logLevel = env.LOG_LEVEL;
  if (env.STAGECRAFT_BASE_CONFIG) configFromEnv.baseConfigPath = env.STAGECRAFT_BASE_CONFIG;
  if (env.STAGECRAFT_TRIGGER_JOB) configFromEnv.triggerJob = env.STAGECRAFT_TRIGGER_JOB;
  if (env.STAGECRAFT_OUTPUT) configFromEnv.outputPath = env.STAGECRAFT_OUTPUT;
  if (env.STAGECRAFT_LOG_DIR) configFromEnv.logDir = env.STAGECRAFT_LOG_DIR;
  if (env.STAGECRAFT_BUILD_DIR) configFromEnv.buildDir = env.STAGECRAFT_BUILD_DIR;
  if (env.STAGECRAFT_BUILD_EXECUTABLE) configFromEnv.buildExecutable = env.STAGECRAFT_BUILD_EXECUTABLE;
  if (env.JOB_CORES) configFromEnv.cores = parseInt(env.JOB_CORES, 10);
  if (env.JOB_MAX_WALLTIME) configFromEnv.walltimeHours = parseInt(env.JOB_MAX_WALLTIME, 10);
  if (env.CUDA_COMPUTE_CAPABILITIES) {
    configFromEnv.computeCapabilities = env.CUDA_COMPUTE_CAPABILITIES.split(",")
      .map((cc) => cc.trim())
      .filter(Boolean);
  }
  if (env.DRYRUN) configFromEnv.dryRun = booleanFromEnv(env.DRYRUN);
  if (env.HIDDEN_GATES_ORDERING) {
    configFromEnv.hiddenGatesOrdering = booleanFromEnv(env.HIDDEN_GATES_ORDERING);
  }

  // Parse and validate
  return schema.parse(configFromEnv);
}

/**
 * Load Stagecraft configuration from the process environment
 */
export function loadStagecraftConfig(env: NodeJS.ProcessEnv = process.env): StagecraftConfig {
  return loadConfig(StagecraftConfigSchema, env);
}
