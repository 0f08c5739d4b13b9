/**
 * Generate runner
 *
 * Graph file + base configuration file -> written child pipeline. Used by
 * the CLI; any other front end can call it the same way.
 */

import { getContext, getContextLogger, runPipeline, runStep } from "@stagecraft/core";
import { compile, loadDependencyGraph, type CompileOptions } from "../compiler/index.js";
import {
  formatForPath,
  serializePipeline,
  writeDocumentAtomic,
  type DocumentFormat,
  type PipelineDocument,
} from "../document/index.js";
import { loadBaseConfig, merge } from "../merge/index.js";

export interface GeneratePipelineRequest {
  graphPath: string;
  baseConfigPath: string;
  triggerJob?: string;
  /** Where to write the document; omit to only return it */
  outputPath?: string;
  /** Defaults to the output path's extension, YAML otherwise */
  format?: DocumentFormat;
  compile: CompileOptions;
}

export interface RunMetadata {
  runId: string;
  stepTimings: Record<string, number>;
}

export interface GeneratePipelineResult {
  document: PipelineDocument;
  text: string;
  outputPath?: string;
  stats: {
    jobs: number;
    edges: number;
    stages: number;
    variables: number;
  };
  metadata: RunMetadata;
}

/**
 * Run `fn` as a named step and record how long it took
 */
export async function timedStep<T>(
  timings: Record<string, number>,
  name: string,
  fn: () => T
): Promise<T> {
  const startTime = Date.now();
  const result = await runStep(name, async () => fn());
  timings[name] = Date.now() - startTime;
  return result;
}

/**
 * Run under the caller's context when there is one, otherwise under a new run ID
 */
export async function withRunContext<T>(prefix: string, fn: (runId: string) => Promise<T>): Promise<T> {
  const context = getContext();
  if (context) {
    return fn(context.runId);
  }
  const runId = `${prefix}-${Date.now()}`;
  return runPipeline(runId, () => fn(runId));
}

/**
 * Compile, merge and (optionally) write a child pipeline
 *
 * Nothing is written unless every step before the write succeeded.
 */
export async function generatePipeline(
  request: GeneratePipelineRequest
): Promise<GeneratePipelineResult> {
  return withRunContext("generate", async (runId) => {
    const stepTimings: Record<string, number> = {};
    const logger = getContextLogger();

    const graph = await timedStep(stepTimings, "loadGraph", () =>
      loadDependencyGraph(request.graphPath)
    );
    const compiled = await timedStep(stepTimings, "compile", () => compile(graph, request.compile));
    const baseConfig = await timedStep(stepTimings, "loadBaseConfig", () =>
      loadBaseConfig(request.baseConfigPath, { triggerJob: request.triggerJob })
    );
    const document = await timedStep(stepTimings, "merge", () => merge(compiled, baseConfig));

    const format = request.format ?? (request.outputPath ? formatForPath(request.outputPath) : "yaml");
    const text = serializePipeline(document, format);

    const outputPath = request.outputPath;
    if (outputPath !== undefined) {
      await timedStep(stepTimings, "write", () => writeDocumentAtomic(outputPath, text));
    }

    const stats = {
      jobs: compiled.jobs.length,
      edges: compiled.jobs.reduce((sum, job) => sum + job.dependsOn.length, 0),
      stages: compiled.stages.length,
      variables: Object.keys(document.variables).length,
    };
    logger.info({ ...stats, outputPath }, "Pipeline generated");

    return { document, text, outputPath, stats, metadata: { runId, stepTimings } };
  });
}
