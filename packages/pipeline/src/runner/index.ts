/**
 * Runners: file-level generate and inject
 */

export {
  generatePipeline,
  timedStep,
  withRunContext,
  type GeneratePipelineRequest,
  type GeneratePipelineResult,
  type RunMetadata,
} from "./generate.js";
export { injectPipeline, type InjectPipelineRequest, type InjectPipelineResult } from "./inject.js";
