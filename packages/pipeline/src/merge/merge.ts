/**
 * Configuration Merge Engine
 *
 * Combines a compiled job set with the base configuration into the final
 * pipeline document.
 */

import { getContextLogger } from "@stagecraft/core";
import type { CompiledPipeline, JobDescriptor } from "../compiler/index.js";
import type { PipelineDocument } from "../document/index.js";
import type { BaseConfig, JobRecord, Variables } from "../schemas/index.js";
import { assertNoCircularVariables } from "./variable-references.js";

/**
 * Serialized form of one compiled job
 */
export function toJobRecord(job: JobDescriptor, artifacts: CompiledPipeline["artifacts"]): JobRecord {
  const record: JobRecord = {
    stage: job.stage,
    script: [...job.command.script],
    variables: { ...job.command.variables },
    timeout: job.command.timeout,
  };

  if (job.dependsOn.length > 0) {
    record.needs = [...job.dependsOn];
  }

  record.artifacts = {
    when: artifacts.when,
    paths: [...job.artifactPaths],
    expire_in: artifacts.expireIn,
  };

  return record;
}

/**
 * Merge base configuration into a compiled job set
 *
 * Jobs are copied in emission order and never modified. `default` is the
 * base configuration's block verbatim (empty when absent). Variables the
 * generator set itself win over trigger-job variables of the same name.
 *
 * @throws {CircularVariableError} The merged variables contain a reference cycle
 */
export function merge(compiled: CompiledPipeline, baseConfig: BaseConfig): PipelineDocument {
  const logger = getContextLogger();

  const jobs: Record<string, JobRecord> = {};
  for (const job of compiled.jobs) {
    jobs[job.name] = toJobRecord(job, compiled.artifacts);
  }

  const variables: Variables = { ...compiled.variables };
  for (const [name, value] of Object.entries(baseConfig.variables)) {
    if (Object.hasOwn(variables, name)) {
      logger.debug({ variable: name }, "Keeping generator variable over trigger-job value");
      continue;
    }
    variables[name] = value;
  }

  assertNoCircularVariables(variables);

  logger.info(
    { jobs: compiled.jobs.length, variables: Object.keys(variables).length },
    "Merged base configuration"
  );

  return {
    stages: [...compiled.stages],
    variables,
    default: structuredClone(baseConfig.defaults ?? {}),
    jobs,
    extras: {},
  };
}
