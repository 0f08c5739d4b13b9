/**
 * In-place injection of base configuration into an existing document
 */

import { getContextLogger } from "@stagecraft/core";
import { validatePipelineStructure, type PipelineDocument } from "../document/index.js";
import { DefaultsBlockSchema, type BaseConfig, type DefaultsBlock, type Variables } from "../schemas/index.js";
import { assertNoCircularVariables } from "./variable-references.js";

const LIST_KEYS = ["tags", "before_script", "after_script"] as const;

/**
 * Base entries first, then existing entries not already present
 */
function mergeList(base: readonly string[] | undefined, existing: readonly string[] | undefined): string[] {
  const merged = [...(base ?? [])];
  for (const entry of existing ?? []) {
    if (!merged.includes(entry)) {
      merged.push(entry);
    }
  }
  return merged;
}

/**
 * Layer a base `default` block over an existing one
 *
 * List keys are unioned (base entries first), `id_tokens` are merged
 * key-wise with base declarations winning, any other key the base sets
 * replaces the existing value.
 */
export function mergeDefaults(existing: DefaultsBlock, base: DefaultsBlock): DefaultsBlock {
  const merged: Record<string, unknown> = { ...existing };

  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      merged[key] = structuredClone(value);
    }
  }

  for (const key of LIST_KEYS) {
    if (base[key] !== undefined || existing[key] !== undefined) {
      merged[key] = mergeList(base[key], existing[key]);
    }
  }

  if (base.id_tokens !== undefined || existing.id_tokens !== undefined) {
    merged.id_tokens = { ...existing.id_tokens, ...structuredClone(base.id_tokens) };
  }

  return DefaultsBlockSchema.parse(merged);
}

/**
 * Apply a base configuration to an existing document without touching its jobs
 *
 * @throws {UnknownDependencyError} A job needs a job the document lacks
 * @throws {CyclicDependencyError} The document's `needs` relation has a cycle
 * @throws {CircularVariableError} The combined variables contain a reference cycle
 */
export function injectDefaults(document: PipelineDocument, baseConfig: BaseConfig): PipelineDocument {
  const logger = getContextLogger();

  validatePipelineStructure(document);

  const variables: Variables = { ...document.variables };
  for (const [name, value] of Object.entries(baseConfig.variables)) {
    if (!Object.hasOwn(variables, name)) {
      variables[name] = value;
    }
  }
  assertNoCircularVariables(variables);

  const defaults = mergeDefaults(document.default, baseConfig.defaults);

  logger.info(
    { jobs: Object.keys(document.jobs).length, defaults: Object.keys(defaults) },
    "Injected base configuration"
  );

  return {
    ...document,
    variables,
    default: defaults,
  };
}
