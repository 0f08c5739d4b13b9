/**
 * Per-job build command and batch-scheduler variables
 */

import type { NodeResources, PackageNode } from "../schemas/index.js";
import type { BuildCommandConfig, CommandPayload, ResourceConfig } from "./types.js";

/**
 * Node override first, uniform value otherwise
 */
export function resolveResources(
  uniform: ResourceConfig,
  override: NodeResources | undefined
): ResourceConfig {
  const computeCapabilities = override?.computeCapabilities ?? uniform.computeCapabilities;
  return {
    cores: override?.cores ?? uniform.cores,
    walltimeHours: override?.walltimeHours ?? uniform.walltimeHours,
    ...(computeCapabilities ? { computeCapabilities } : {}),
  };
}

function substitute(arg: string, node: PackageNode, jobName: string): string {
  return arg
    .replaceAll("{identity}", node.identity)
    .replaceAll("{displayName}", node.displayName)
    .replaceAll("{job}", jobName);
}

/**
 * Build the command payload that builds exactly `node` (not its dependents)
 */
export function buildJobCommand(
  node: PackageNode,
  jobName: string,
  command: BuildCommandConfig,
  resources: ResourceConfig
): CommandPayload {
  const parts = [command.executable, ...command.args.map((arg) => substitute(arg, node, jobName))];
  if (command.dryRun) {
    parts.push("--dry-run");
  }
  parts.push(node.buildTarget ?? node.identity);

  const variables: Record<string, string> = {
    BUILD_IDENTITY: node.identity,
    SLURM_CPUS_PER_TASK: String(resources.cores),
  };
  if (resources.cores > 1) {
    variables.SBATCH_CPUS_PER_TASK = String(resources.cores);
  }
  if (resources.walltimeHours > 1) {
    variables.SBATCH_TIME = `${resources.walltimeHours}:00:00`;
  }
  if (resources.computeCapabilities?.length) {
    variables.CUDA_COMPUTE_CAPABILITIES = resources.computeCapabilities.join(",");
  }

  return {
    script: [parts.join(" ")],
    variables,
    timeout: `${resources.walltimeHours}h`,
  };
}
