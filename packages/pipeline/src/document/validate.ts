/**
 * Structural checks on a pipeline document
 */

import { CyclicDependencyError, UnknownDependencyError } from "../errors/index.js";
import { buildAdjacencyList, detectCycle } from "../graph/index.js";
import { neededJob } from "../schemas/index.js";
import type { PipelineDocument } from "./types.js";

/**
 * Every `needs` entry names a job of the same document, and `needs` is acyclic
 *
 * @throws {UnknownDependencyError} A job needs a job that does not exist
 * @throws {CyclicDependencyError} The `needs` relation has a cycle (job names)
 */
export function validatePipelineStructure(document: PipelineDocument): void {
  const names = Object.keys(document.jobs);
  const known = new Set(names);
  const edges: Array<[string, string]> = [];

  for (const [name, job] of Object.entries(document.jobs)) {
    for (const entry of job.needs ?? []) {
      const needed = neededJob(entry);
      if (!known.has(needed)) {
        throw new UnknownDependencyError(name, needed);
      }
      edges.push([name, needed]);
    }
  }

  const cycle = detectCycle(buildAdjacencyList(names, edges));
  if (cycle) {
    throw new CyclicDependencyError(cycle);
  }
}
