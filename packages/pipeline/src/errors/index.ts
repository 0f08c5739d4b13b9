/**
 * Errors raised while compiling graphs and merging configuration
 *
 * Each error carries the structured detail needed to diagnose it (the
 * offending identity, the cycle, the path) so a failed run never has to
 * be repeated with extra instrumentation.
 */

import { ConfigurationError, InputError, StructuralError } from "@stagecraft/core";

/**
 * The dependency graph has no nodes
 */
export class EmptyGraphError extends InputError {
  constructor() {
    super("Dependency graph is empty: nothing to compile");
    this.name = "EmptyGraphError";
  }
}

/**
 * The dependency graph document does not match the expected shape
 */
export class GraphParseError extends InputError {
  constructor(
    public readonly source: string,
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid dependency graph in ${source}: ${issues.join("; ")}`, options);
    this.name = "GraphParseError";
  }
}

/**
 * The dependency graph file does not exist
 */
export class GraphNotFoundError extends InputError {
  constructor(public readonly path: string) {
    super(`Dependency graph not found: ${path}`);
    this.name = "GraphNotFoundError";
  }
}

/**
 * Two nodes share one identity
 */
export class DuplicateIdentityError extends InputError {
  constructor(public readonly identity: string) {
    super(`Duplicate node identity in dependency graph: "${identity}"`);
    this.name = "DuplicateIdentityError";
  }
}

/**
 * A dependency edge points at an identity that is not in the graph
 */
export class UnknownDependencyError extends StructuralError {
  constructor(
    public readonly identity: string,
    public readonly missingIdentity: string
  ) {
    super(`"${identity}" depends on "${missingIdentity}", which is not part of the graph`);
    this.name = "UnknownDependencyError";
  }
}

/**
 * The ordering edges form a cycle
 */
export class CyclicDependencyError extends StructuralError {
  constructor(public readonly cycle: string[]) {
    super(`Dependency cycle detected: ${[...cycle, cycle[0]].join(" -> ")}`);
    this.name = "CyclicDependencyError";
  }
}

/**
 * Two jobs would write the same artifact path
 */
export class ArtifactCollisionError extends StructuralError {
  constructor(
    public readonly path: string,
    public readonly identities: [string, string]
  ) {
    super(
      `Artifact path "${path}" is claimed by both "${identities[0]}" and "${identities[1]}"`
    );
    this.name = "ArtifactCollisionError";
  }
}

/**
 * The base configuration document does not exist
 */
export class ConfigurationNotFoundError extends ConfigurationError {
  constructor(public readonly path: string) {
    super(`Base configuration not found: ${path}`);
    this.name = "ConfigurationNotFoundError";
  }
}

/**
 * The base configuration document exists but cannot be used
 */
export class ConfigurationParseError extends ConfigurationError {
  constructor(
    public readonly path: string,
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Malformed base configuration ${path}: ${issues.join("; ")}`, options);
    this.name = "ConfigurationParseError";
  }
}

/**
 * A variable references itself, directly or through other variables
 */
export class CircularVariableError extends ConfigurationError {
  constructor(public readonly cycle: string[]) {
    super(`Circular variable reference: ${[...cycle, cycle[0]].join(" -> ")}`);
    this.name = "CircularVariableError";
  }
}

/**
 * An existing pipeline document cannot be parsed
 */
export class PipelineDocumentParseError extends InputError {
  constructor(
    public readonly source: string,
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid pipeline document ${source}: ${issues.join("; ")}`, options);
    this.name = "PipelineDocumentParseError";
  }
}
