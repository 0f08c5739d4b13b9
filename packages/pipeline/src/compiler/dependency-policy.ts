/**
 * Which dependency kinds make a job wait for its dependency's job
 */

import { DependencyKindEnum, type DependencyKind } from "../schemas/index.js";

export type DependencyPolicy = Readonly<Record<DependencyKind, boolean>>;

/**
 * Every kind gates ordering. Hidden dependencies are still installed
 * into the dependent's environment, so their job has to finish first.
 */
export const DEFAULT_DEPENDENCY_POLICY: DependencyPolicy = {
  runtime: true,
  "build-only": true,
  hidden: true,
};

/**
 * Apply per-kind overrides on top of the default policy
 */
export function resolveDependencyPolicy(
  overrides: Partial<Record<DependencyKind, boolean>> = {}
): DependencyPolicy {
  const policy: Record<DependencyKind, boolean> = { ...DEFAULT_DEPENDENCY_POLICY };
  for (const kind of DependencyKindEnum.options) {
    const override = overrides[kind];
    if (override !== undefined) {
      policy[kind] = override;
    }
  }
  return policy;
}

export function gatesOrdering(
  kind: DependencyKind,
  policy: DependencyPolicy = DEFAULT_DEPENDENCY_POLICY
): boolean {
  return policy[kind];
}
