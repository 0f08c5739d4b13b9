/**
 * Configuration Merge Engine
 */

export { merge, toJobRecord } from "./merge.js";
export { injectDefaults, mergeDefaults } from "./inject.js";
export {
  loadBaseConfig,
  parseBaseConfig,
  DEFAULT_TRIGGER_JOB,
  type BaseConfigOptions,
} from "./base-config.js";
export {
  extractReferences,
  findVariableCycle,
  assertNoCircularVariables,
} from "./variable-references.js";
