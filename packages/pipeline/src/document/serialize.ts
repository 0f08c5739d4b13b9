/**
 * Render the document model as YAML or JSON
 */

import { stringify } from "yaml";
import type { DocumentFormat, PipelineDocument } from "./types.js";

/**
 * Top-level object in the key order the CI reads best:
 * stages, variables, default, other reserved keys, then jobs
 */
export function toPlainDocument(document: PipelineDocument): Record<string, unknown> {
  return {
    stages: [...document.stages],
    variables: document.variables,
    default: document.default,
    ...document.extras,
    ...document.jobs,
  };
}

/**
 * Serialize a document. Identical documents always produce identical text.
 */
export function serializePipeline(document: PipelineDocument, format: DocumentFormat = "yaml"): string {
  const plain = toPlainDocument(document);

  if (format === "json") {
    return `${JSON.stringify(plain, null, 2)}\n`;
  }

  return stringify(plain, { lineWidth: 120, aliasDuplicateObjects: false });
}

/**
 * Pick the output format from a file name, YAML unless it ends in .json
 */
export function formatForPath(path: string): DocumentFormat {
  return path.toLowerCase().endsWith(".json") ? "json" : "yaml";
}
