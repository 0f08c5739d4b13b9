/**
 * Text blocks printed after a successful run
 */

import { basename } from "node:path";

/**
 * Parent-pipeline job that triggers the generated child pipeline
 *
 * @param outputPath - Generated file, uploaded as an artifact of `generatorJob`
 */
export function formatTriggerSnippet(
  outputPath: string,
  triggerJob: string,
  generatorJob = "generate_pipeline"
): string[] {
  return [
    `${triggerJob}:`,
    "  stage: build",
    "  trigger:",
    "    include:",
    `      - artifact: ${basename(outputPath)}`,
    `        job: ${generatorJob}`,
    "    strategy: depend",
  ];
}

export interface GenerateSummaryInput {
  outputPath?: string;
  stats: {
    jobs: number;
    edges: number;
    stages: number;
    variables: number;
  };
  stepTimings: Record<string, number>;
}

/**
 * One line per statistic, then the per-step timings
 */
export function formatGenerateSummary(input: GenerateSummaryInput): string[] {
  const lines = [
    `Jobs: ${input.stats.jobs}`,
    `Needs edges: ${input.stats.edges}`,
    `Stages: ${input.stats.stages}`,
    `Variables: ${input.stats.variables}`,
  ];
  if (input.outputPath !== undefined) {
    lines.push(`Written: ${input.outputPath}`);
  }
  const timings = Object.entries(input.stepTimings).map(([step, ms]) => `${step} ${ms}ms`);
  if (timings.length > 0) {
    lines.push(`Steps: ${timings.join(", ")}`);
  }
  return lines;
}
