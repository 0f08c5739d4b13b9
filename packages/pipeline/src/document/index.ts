/**
 * Pipeline document model and IO
 */

export { parsePipelineDocument } from "./parse.js";
export { serializePipeline, toPlainDocument, formatForPath } from "./serialize.js";
export { validatePipelineStructure } from "./validate.js";
export { readTextFile, fileExists, writeDocumentAtomic } from "./io.js";
export type { PipelineDocument, DocumentFormat } from "./types.js";
