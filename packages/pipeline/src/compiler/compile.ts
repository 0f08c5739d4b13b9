/**
 * Graph-to-Pipeline Compiler
 *
 * Turns a resolved dependency graph into an acyclic, deterministically
 * named and ordered set of CI jobs.
 */

import { posix } from "node:path";
import { getContextLogger } from "@stagecraft/core";
import { PIPELINE_DEFAULTS } from "../constants/index.js";
import type { DependencyGraph, PackageNode } from "../schemas/index.js";
import {
  ArtifactCollisionError,
  CyclicDependencyError,
  DuplicateIdentityError,
  EmptyGraphError,
  UnknownDependencyError,
} from "../errors/index.js";
import { buildAdjacencyList, computeDepths, detectCycle, getTopologicalOrder } from "../graph/index.js";
import { gatesOrdering, resolveDependencyPolicy } from "./dependency-policy.js";
import { buildJobCommand, resolveResources } from "./job-command.js";
import { JobNameAllocator, artifactToken } from "./sanitize.js";
import type { CompileOptions, CompiledPipeline, JobDescriptor } from "./types.js";

/**
 * Index nodes by identity, rejecting empty graphs and repeated identities
 */
function indexNodes(graph: DependencyGraph): Map<string, PackageNode> {
  if (graph.nodes.length === 0) {
    throw new EmptyGraphError();
  }

  const nodes = new Map<string, PackageNode>();
  for (const node of graph.nodes) {
    if (nodes.has(node.identity)) {
      throw new DuplicateIdentityError(node.identity);
    }
    nodes.set(node.identity, node);
  }
  return nodes;
}

/**
 * Ordering edges between identities, after the kind policy is applied
 */
function collectOrderingEdges(
  nodes: ReadonlyMap<string, PackageNode>,
  options: CompileOptions
): Array<[string, string]> {
  const policy = resolveDependencyPolicy(options.dependencyPolicy);
  const edges: Array<[string, string]> = [];

  for (const node of nodes.values()) {
    for (const dep of node.dependencies) {
      if (!nodes.has(dep.identity)) {
        throw new UnknownDependencyError(node.identity, dep.identity);
      }
      if (gatesOrdering(dep.kind, policy)) {
        edges.push([node.identity, dep.identity]);
      }
    }
  }

  return edges;
}

/**
 * Log and build-tree globs for one job, claimed in `owners`
 */
function claimArtifactPaths(
  node: PackageNode,
  options: CompileOptions,
  owners: Map<string, string>
): string[] {
  const token = artifactToken(node.identity);
  const paths = [
    posix.join(options.artifacts.logDir, token, "*.log"),
    posix.join(options.artifacts.buildDir, token, "**", "*.log"),
  ];

  for (const path of paths) {
    const owner = owners.get(path);
    if (owner !== undefined && owner !== node.identity) {
      throw new ArtifactCollisionError(path, [owner, node.identity]);
    }
    owners.set(path, node.identity);
  }

  return paths;
}

/**
 * Compile a dependency graph into a job set
 *
 * @throws {EmptyGraphError} The graph has no nodes
 * @throws {DuplicateIdentityError} Two nodes share an identity
 * @throws {UnknownDependencyError} An edge names an identity outside the graph
 * @throws {CyclicDependencyError} Ordering edges form a cycle (minimal cycle attached)
 * @throws {ArtifactCollisionError} Two nodes map to the same artifact path
 */
export function compile(graph: DependencyGraph, options: CompileOptions): CompiledPipeline {
  const logger = getContextLogger();
  const nodes = indexNodes(graph);

  // Names are allocated in insertion order so the mapping is stable
  const allocator = new JobNameAllocator();
  for (const identity of nodes.keys()) {
    allocator.allocate(identity);
  }
  const nameByIdentity = allocator.names;

  const ordering = buildAdjacencyList(nodes.keys(), collectOrderingEdges(nodes, options));

  const cycle = detectCycle(ordering);
  if (cycle) {
    logger.error({ cycle }, "Dependency cycle in graph");
    throw new CyclicDependencyError(cycle);
  }

  const order = getTopologicalOrder(ordering);
  if (!order) {
    throw new Error("Topological sort failed on a graph without cycles");
  }

  const stageStrategy = options.stageStrategy ?? "single";
  const depths = stageStrategy === "depth" ? computeDepths(ordering, order) : null;
  const stageOf = (identity: string): string =>
    depths ? `${PIPELINE_DEFAULTS.STAGE}-${depths.get(identity) ?? 0}` : PIPELINE_DEFAULTS.STAGE;

  const owners = new Map<string, string>();
  const jobs: JobDescriptor[] = [];

  for (const identity of order) {
    const node = nodes.get(identity);
    const name = nameByIdentity.get(identity);
    if (!node || name === undefined) {
      throw new Error(`Node "${identity}" lost during ordering`);
    }

    const dependsOn = (ordering.get(identity) ?? []).map((dep) => nameByIdentity.get(dep) ?? dep);
    const resources = resolveResources(options.resources, node.resources);

    const job: JobDescriptor = Object.freeze({
      name,
      identity,
      displayName: node.displayName,
      stage: stageOf(identity),
      dependsOn: Object.freeze(dependsOn),
      artifactPaths: Object.freeze(claimArtifactPaths(node, options, owners)),
      command: buildJobCommand(node, name, options.command, resources),
    });
    jobs.push(job);

    logger.debug({ job: name, identity, needs: dependsOn }, "Compiled job");
  }

  const stages = depths
    ? [...new Set([...depths.values()])].sort((a, b) => a - b).map((d) => `${PIPELINE_DEFAULTS.STAGE}-${d}`)
    : [PIPELINE_DEFAULTS.STAGE];

  const edgeCount = jobs.reduce((sum, job) => sum + job.dependsOn.length, 0);
  logger.info({ jobs: jobs.length, edges: edgeCount, stages: stages.length }, "Compiled dependency graph");

  return {
    jobs,
    stages,
    variables: { ...(options.variables ?? {}) },
    artifacts: {
      when: options.artifacts.when ?? PIPELINE_DEFAULTS.ARTIFACTS_WHEN,
      expireIn: options.artifacts.expireIn ?? PIPELINE_DEFAULTS.ARTIFACTS_EXPIRE_IN,
    },
    nameByIdentity,
  };
}
