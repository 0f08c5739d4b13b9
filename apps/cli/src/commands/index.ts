/**
 * Stagecraft CLI Commands
 *
 * Explicit command registration for OCLIF
 */

import PipelineGenerate from "./pipeline/generate.js";
import PipelineInject from "./pipeline/inject.js";

export const COMMANDS = {
  "pipeline:generate": PipelineGenerate,
  "pipeline:inject": PipelineInject,
};

export { PipelineGenerate, PipelineInject };
