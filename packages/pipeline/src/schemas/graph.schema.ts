/**
 * Dependency Graph Schema
 *
 * Shape of the resolved dependency graph handed over by the external
 * resolver: one node per buildable package, each listing the identities
 * it depends on.
 */

import { z } from "zod";

/**
 * Kinds of dependency edges between packages
 */
export const DependencyKindEnum = z.enum([
  "runtime",    // Needed to build and to run the dependent
  "build-only", // Needed only while building the dependent
  "hidden",     // Installed but not exposed to users of the dependent
]);

export type DependencyKind = z.infer<typeof DependencyKindEnum>;

/**
 * One dependency edge, seen from the depending node
 */
export const DependencyEdgeSchema = z.object({
  identity: z.string().min(1).describe("Identity of the node depended on"),
  kind: DependencyKindEnum.default("runtime").describe("Kind of dependency"),
});

export type DependencyEdge = z.infer<typeof DependencyEdgeSchema>;

/**
 * Per-node override of the uniform job resources
 */
export const NodeResourcesSchema = z.object({
  cores: z.number().int().positive().optional(),
  walltimeHours: z.number().int().positive().optional(),
  computeCapabilities: z.array(z.string().min(1)).optional(),
});

export type NodeResources = z.infer<typeof NodeResourcesSchema>;

/**
 * One buildable package
 */
export const PackageNodeSchema = z
  .object({
    identity: z.string().min(1).describe("Unique key: name, version and toolchain"),
    displayName: z.string().min(1).optional().describe("Human-readable label"),
    buildTarget: z
      .string()
      .min(1)
      .optional()
      .describe("Argument that makes the build command build exactly this node"),
    dependencies: z.array(DependencyEdgeSchema).default([]),
    resources: NodeResourcesSchema.optional(),
  })
  .transform((node) => ({
    ...node,
    displayName: node.displayName ?? node.identity,
  }));

export type PackageNode = z.output<typeof PackageNodeSchema>;
export type PackageNodeInput = z.input<typeof PackageNodeSchema>;

/**
 * The whole graph, nodes in resolver order
 */
export const DependencyGraphSchema = z.object({
  nodes: z.array(PackageNodeSchema),
});

export type DependencyGraph = z.output<typeof DependencyGraphSchema>;
export type DependencyGraphInput = z.input<typeof DependencyGraphSchema>;
