/**
 * Compiler input options and output model
 */

import type { DependencyKind, Variables } from "../schemas/index.js";

export type ArtifactsWhen = "always" | "on_success" | "on_failure";

/**
 * Where each job's logs live, and how long the CI keeps them
 */
export interface ArtifactConfig {
  logDir: string;
  buildDir: string;
  /** @default "always" */
  when?: ArtifactsWhen;
  /** @default "1 week" */
  expireIn?: string;
}

/**
 * Uniform per-job resources; a node's `resources` override them
 */
export interface ResourceConfig {
  cores: number;
  walltimeHours: number;
  computeCapabilities?: string[];
}

/**
 * The build invocation every job runs for its own node
 *
 * `args` may contain `{identity}`, `{displayName}` and `{job}`, which are
 * replaced per job. The node's build target is appended last.
 */
export interface BuildCommandConfig {
  executable: string;
  args: string[];
  dryRun?: boolean;
}

export type StageStrategy = "single" | "depth";

export interface CompileOptions {
  artifacts: ArtifactConfig;
  resources: ResourceConfig;
  command: BuildCommandConfig;
  dependencyPolicy?: Partial<Record<DependencyKind, boolean>>;
  /** @default "single" */
  stageStrategy?: StageStrategy;
  /** Pipeline-level variables owned by the generator */
  variables?: Variables;
}

/**
 * What a job runs, resolved for one node
 */
export interface CommandPayload {
  readonly script: readonly string[];
  readonly variables: Readonly<Record<string, string>>;
  readonly timeout: string;
}

/**
 * One compiled CI job. Created once per package node, never mutated.
 */
export interface JobDescriptor {
  readonly name: string;
  readonly identity: string;
  readonly displayName: string;
  readonly stage: string;
  /** Job names this job needs, in dependency declaration order */
  readonly dependsOn: readonly string[];
  readonly artifactPaths: readonly string[];
  readonly command: CommandPayload;
}

/**
 * Compiler output: the job set plus what the document needs around it
 */
export interface CompiledPipeline {
  /** Jobs in emission (stable topological) order */
  readonly jobs: readonly JobDescriptor[];
  readonly stages: readonly string[];
  readonly variables: Readonly<Variables>;
  readonly artifacts: {
    readonly when: ArtifactsWhen;
    readonly expireIn: string;
  };
  readonly nameByIdentity: ReadonlyMap<string, string>;
}
