/**
 * Pipeline Constants
 *
 * Fixed names and defaults of the emitted child pipeline.
 */

export const PIPELINE_DEFAULTS = {
  /**
   * Stage every job runs in under the "single" stage strategy; the
   * "depth" strategy appends `-<depth>`
   */
  STAGE: "build",

  /**
   * When artifacts are uploaded. Logs of failed builds matter most.
   */
  ARTIFACTS_WHEN: "always",

  /**
   * How long the CI keeps job artifacts
   */
  ARTIFACTS_EXPIRE_IN: "1 week",
} as const;

/**
 * Top-level keys a pipeline document reserves; a job may not be called any of these
 */
export const RESERVED_TOP_LEVEL_KEYS: ReadonlySet<string> = new Set([
  "default",
  "include",
  "stages",
  "variables",
  "workflow",
  "image",
  "services",
  "cache",
  "before_script",
  "after_script",
  "types",
  "pages:deploy",
  "true",
  "false",
  "nil",
]);
