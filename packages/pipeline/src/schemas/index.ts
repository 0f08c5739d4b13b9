/**
 * Input and document schemas
 */

// Dependency graph (compiler input)
export {
  DependencyKindEnum,
  DependencyEdgeSchema,
  NodeResourcesSchema,
  PackageNodeSchema,
  DependencyGraphSchema,
  type DependencyKind,
  type DependencyEdge,
  type NodeResources,
  type PackageNode,
  type PackageNodeInput,
  type DependencyGraph,
  type DependencyGraphInput,
} from "./graph.schema.js";

// Base configuration (merge input)
export {
  VariableValueSchema,
  VariablesSchema,
  IdTokenSchema,
  RetryPolicySchema,
  DefaultsBlockSchema,
  TriggerJobSchema,
  type VariableValue,
  type Variables,
  type RetryPolicy,
  type DefaultsBlock,
  type BaseConfig,
} from "./base-config.schema.js";

// Pipeline document jobs
export {
  NeedsEntrySchema,
  ArtifactsBlockSchema,
  JobRecordSchema,
  neededJob,
  type NeedsEntry,
  type ArtifactsBlock,
  type JobRecord,
} from "./pipeline-document.schema.js";

export { formatIssues } from "./issues.js";
