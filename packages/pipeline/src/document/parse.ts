/**
 * Read an existing child-pipeline document back into the document model
 */

import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { describeError } from "@stagecraft/core";
import { PipelineDocumentParseError } from "../errors/index.js";
import { RESERVED_TOP_LEVEL_KEYS } from "../constants/index.js";
import {
  DefaultsBlockSchema,
  JobRecordSchema,
  VariablesSchema,
  formatIssues,
  type DefaultsBlock,
  type JobRecord,
  type Variables,
} from "../schemas/index.js";
import { isRecord } from "../utils/index.js";
import type { PipelineDocument } from "./types.js";

const StagesSchema = z.array(z.string());

/**
 * Parse a pipeline document (YAML or JSON text)
 *
 * `stages`, `variables` and `default` are lifted into their own fields,
 * other reserved keys go to `extras`, everything else must be a job.
 *
 * @throws {PipelineDocumentParseError} Unparseable text, empty document, or invalid section
 */
export function parsePipelineDocument(text: string, source = "<input>"): PipelineDocument {
  let data: unknown;
  try {
    data = parseYaml(text, { merge: true });
  } catch (error) {
    throw new PipelineDocumentParseError(source, [describeError(error)], { cause: error });
  }

  if (data === null || data === undefined) {
    throw new PipelineDocumentParseError(source, ["document is empty"]);
  }
  if (!isRecord(data)) {
    throw new PipelineDocumentParseError(source, ["top level must be a mapping"]);
  }

  const issues: string[] = [];
  let stages: string[] = [];
  let variables: Variables = {};
  let defaults: DefaultsBlock = {};
  const jobs: Record<string, JobRecord> = {};
  const extras: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case "stages": {
        const result = StagesSchema.safeParse(value);
        if (result.success) stages = result.data;
        else issues.push(...formatIssues(result.error, key));
        break;
      }
      case "variables": {
        const result = VariablesSchema.safeParse(value ?? {});
        if (result.success) variables = result.data;
        else issues.push(...formatIssues(result.error, key));
        break;
      }
      case "default": {
        const result = DefaultsBlockSchema.safeParse(value ?? {});
        if (result.success) defaults = result.data;
        else issues.push(...formatIssues(result.error, key));
        break;
      }
      default: {
        if (RESERVED_TOP_LEVEL_KEYS.has(key)) {
          extras[key] = value;
          break;
        }
        const result = JobRecordSchema.safeParse(value);
        if (result.success) jobs[key] = result.data;
        else issues.push(...formatIssues(result.error, key));
      }
    }
  }

  if (issues.length > 0) {
    throw new PipelineDocumentParseError(source, issues);
  }

  return { stages, variables, default: defaults, jobs, extras };
}
