/**
 * Dependency graph loading
 */

import { parse as parseYaml } from "yaml";
import { describeError, getContextLogger } from "@stagecraft/core";
import { GraphNotFoundError, GraphParseError } from "../errors/index.js";
import { fileExists, readTextFile } from "../document/index.js";
import { DependencyGraphSchema, formatIssues, type DependencyGraph } from "../schemas/index.js";

/**
 * Validate an already-decoded graph object
 *
 * @throws {GraphParseError} The object does not describe a graph
 */
export function parseDependencyGraph(data: unknown, source = "<input>"): DependencyGraph {
  const result = DependencyGraphSchema.safeParse(data);
  if (!result.success) {
    throw new GraphParseError(source, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load a dependency graph from a YAML or JSON file
 *
 * @throws {GraphNotFoundError} No file at `path`
 * @throws {GraphParseError} The file is not a valid graph
 * @throws {IOError} The file cannot be read
 */
export function loadDependencyGraph(path: string): DependencyGraph {
  if (!fileExists(path)) {
    throw new GraphNotFoundError(path);
  }

  const text = readTextFile(path);
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    throw new GraphParseError(path, [describeError(error)], { cause: error });
  }

  const graph = parseDependencyGraph(data, path);
  getContextLogger().info({ path, nodes: graph.nodes.length }, "Loaded dependency graph");
  return graph;
}
