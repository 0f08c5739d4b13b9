/**
 * Small shared helpers
 */

/**
 * A YAML/JSON mapping, as opposed to a scalar, sequence or null
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
