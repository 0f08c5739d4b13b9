/**
 * @stagecraft/pipeline - Graph-to-pipeline compiler and merge engine
 *
 * Compiles a resolved package dependency graph into CI child-pipeline
 * jobs and merges an externally authored base configuration into them.
 */

// Compiler
export * from "./compiler/index.js";

// Merge engine
export * from "./merge/index.js";

// Document model and IO
export * from "./document/index.js";

// File-level runners
export * from "./runner/index.js";

// Graph utilities
export * from "./graph/index.js";

// Schemas
export * from "./schemas/index.js";

// Errors
export * from "./errors/index.js";

// Constants
export * from "./constants/index.js";
