/**
 * Graph-to-Pipeline Compiler
 */

export { compile } from "./compile.js";
export { sanitizeJobName, artifactToken, JobNameAllocator } from "./sanitize.js";
export { loadDependencyGraph, parseDependencyGraph } from "./load-graph.js";
export {
  DEFAULT_DEPENDENCY_POLICY,
  resolveDependencyPolicy,
  gatesOrdering,
  type DependencyPolicy,
} from "./dependency-policy.js";
export { buildJobCommand, resolveResources } from "./job-command.js";
export type {
  ArtifactConfig,
  ArtifactsWhen,
  BuildCommandConfig,
  CommandPayload,
  CompileOptions,
  CompiledPipeline,
  JobDescriptor,
  ResourceConfig,
  StageStrategy,
} from "./types.js";
