import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";
import { describeError, exitCodeFor, getLogger, runPipeline } from "@stagecraft/core";
import { generatePipeline, type DocumentFormat, type StageStrategy } from "@stagecraft/pipeline";
import {
  formatGenerateSummary,
  formatTriggerSnippet,
  loadEnvConfig,
  loggerConfigFor,
  parseVariableAssignments,
} from "../../lib/index.js";

export default class PipelineGenerate extends Command {
  static override args = {
    graph: Args.file({
      description: "Path to the resolved dependency graph (YAML or JSON)",
      required: true,
    }),
  };

  static override description =
    "Compile a dependency graph into a CI child pipeline and merge the base configuration into it";

  static override examples = [
    "<%= config.bin %> <%= command.id %> graph.yml",
    "<%= config.bin %> <%= command.id %> graph.yml -c .gitlab-ci.yml -o child.yml --cores 8",
    "<%= config.bin %> <%= command.id %> graph.json --stage-strategy depth --stdout --format json",
  ];

  static override flags = {
    config: Flags.string({
      char: "c",
      description: "Base configuration document (default: $STAGECRAFT_BASE_CONFIG or .gitlab-ci.yml)",
    }),
    "trigger-job": Flags.string({
      description: "Job in the base configuration whose variables are inherited",
    }),
    output: Flags.string({
      char: "o",
      description: "Where to write the child pipeline",
    }),
    format: Flags.string({
      description: "Output format (default: from the output file extension)",
      options: ["yaml", "json"],
    }),
    stdout: Flags.boolean({
      description: "Print the document instead of writing it",
      default: false,
    }),
    "log-dir": Flags.string({ description: "Base directory of build logs" }),
    "build-dir": Flags.string({ description: "Base directory of build trees" }),
    cores: Flags.integer({ description: "Cores per job", min: 1 }),
    walltime: Flags.integer({ description: "Walltime per job, in hours", min: 1 }),
    "compute-capability": Flags.string({
      description: "GPU compute capability exported to every job",
      multiple: true,
    }),
    executable: Flags.string({ description: "Build tool each job runs" }),
    arg: Flags.string({
      description: "Extra build tool argument; {identity}, {displayName} and {job} are substituted",
      multiple: true,
    }),
    variable: Flags.string({
      description: "Pipeline variable as KEY=VALUE",
      multiple: true,
    }),
    "dry-run": Flags.boolean({
      description: "Append --dry-run to every build command",
    }),
    "hidden-ordering": Flags.boolean({
      description: "Let hidden dependencies gate job ordering",
      allowNo: true,
    }),
    "stage-strategy": Flags.string({
      description: "One stage for all jobs, or one stage per dependency depth",
      options: ["single", "depth"],
      default: "single",
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PipelineGenerate);

    try {
      const env = loadEnvConfig();
      getLogger(loggerConfigFor(env));
      const triggerJob = flags["trigger-job"] ?? env.triggerJob;
      const outputPath = flags.stdout ? undefined : (flags.output ?? env.outputPath);
      const stageStrategy: StageStrategy = flags["stage-strategy"] === "depth" ? "depth" : "single";
      let format: DocumentFormat | undefined;
      if (flags.format === "json" || flags.format === "yaml") {
        format = flags.format;
      }

      const result = await runPipeline(`generate-${Date.now()}`, () =>
        generatePipeline({
          graphPath: args.graph,
          baseConfigPath: flags.config ?? env.baseConfigPath,
          triggerJob,
          outputPath,
          format,
          compile: {
            artifacts: {
              logDir: flags["log-dir"] ?? env.logDir,
              buildDir: flags["build-dir"] ?? env.buildDir,
            },
            resources: {
              cores: flags.cores ?? env.cores,
              walltimeHours: flags.walltime ?? env.walltimeHours,
              computeCapabilities: flags["compute-capability"] ?? env.computeCapabilities,
            },
            command: {
              executable: flags.executable ?? env.buildExecutable,
              args: flags.arg ?? [],
              dryRun: flags["dry-run"] ?? env.dryRun,
            },
            dependencyPolicy: { hidden: flags["hidden-ordering"] ?? env.hiddenGatesOrdering },
            stageStrategy,
            variables: parseVariableAssignments(flags.variable ?? []),
          },
        })
      );

      if (flags.stdout) {
        process.stdout.write(result.text);
        return;
      }

      this.log(chalk.green("Pipeline generated"));
      for (const line of formatGenerateSummary({
        outputPath: result.outputPath,
        stats: result.stats,
        stepTimings: result.metadata.stepTimings,
      })) {
        this.log(`  ${line}`);
      }
      if (result.outputPath !== undefined) {
        this.log("");
        this.log(chalk.dim("Trigger it from the parent pipeline with:"));
        for (const line of formatTriggerSnippet(result.outputPath, triggerJob)) {
          this.log(chalk.cyan(line));
        }
      }
    } catch (error) {
      this.error(`Pipeline generation failed: ${describeError(error)}`, { exit: exitCodeFor(error) });
    }
  }
}
