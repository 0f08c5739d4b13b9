/**
 * The emitted child-pipeline document
 */

import type { DefaultsBlock, JobRecord, Variables } from "../schemas/index.js";

export interface PipelineDocument {
  stages: string[];
  /** Child-pipeline variables, handed down from the trigger job */
  variables: Variables;
  /** Always present, possibly empty */
  default: DefaultsBlock;
  /** Jobs in emission order */
  jobs: Record<string, JobRecord>;
  /** Other reserved top-level keys (include, workflow, ...) read from an existing document */
  extras: Record<string, unknown>;
}

export type DocumentFormat = "yaml" | "json";
