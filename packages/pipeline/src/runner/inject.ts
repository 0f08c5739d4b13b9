/**
 * Inject runner
 *
 * Existing child pipeline + base configuration file -> the same file,
 * rewritten with the base configuration applied.
 */

import { getContextLogger } from "@stagecraft/core";
import {
  formatForPath,
  parsePipelineDocument,
  readTextFile,
  serializePipeline,
  writeDocumentAtomic,
  type PipelineDocument,
} from "../document/index.js";
import { injectDefaults, loadBaseConfig } from "../merge/index.js";
import { timedStep, withRunContext, type RunMetadata } from "./generate.js";

export interface InjectPipelineRequest {
  documentPath: string;
  baseConfigPath: string;
  triggerJob?: string;
  /** Validate and render without rewriting the file */
  dryRun?: boolean;
}

export interface InjectPipelineResult {
  document: PipelineDocument;
  text: string;
  written: boolean;
  metadata: RunMetadata;
}

/**
 * Validate an existing document, apply the base configuration, rewrite it in place
 */
export async function injectPipeline(request: InjectPipelineRequest): Promise<InjectPipelineResult> {
  return withRunContext("inject", async (runId) => {
    const stepTimings: Record<string, number> = {};

    const existing = await timedStep(stepTimings, "readDocument", () =>
      parsePipelineDocument(readTextFile(request.documentPath), request.documentPath)
    );
    const baseConfig = await timedStep(stepTimings, "loadBaseConfig", () =>
      loadBaseConfig(request.baseConfigPath, { triggerJob: request.triggerJob })
    );
    const document = await timedStep(stepTimings, "inject", () => injectDefaults(existing, baseConfig));

    const text = serializePipeline(document, formatForPath(request.documentPath));

    if (!request.dryRun) {
      await timedStep(stepTimings, "write", () => writeDocumentAtomic(request.documentPath, text));
    }

    getContextLogger().info(
      { path: request.documentPath, written: !request.dryRun },
      "Base configuration injected"
    );

    return { document, text, written: !request.dryRun, metadata: { runId, stepTimings } };
  });
}
