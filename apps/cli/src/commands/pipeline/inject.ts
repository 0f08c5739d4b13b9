import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";
import { describeError, exitCodeFor, getLogger, runPipeline } from "@stagecraft/core";
import { injectPipeline } from "@stagecraft/pipeline";
import { loadEnvConfig, loggerConfigFor } from "../../lib/index.js";

export default class PipelineInject extends Command {
  static override args = {
    document: Args.file({
      description: "Existing child pipeline to rewrite",
      required: true,
    }),
  };

  static override description =
    "Apply the base configuration's defaults and variables to an existing child pipeline";

  static override examples = [
    "<%= config.bin %> <%= command.id %> ci-child-pipeline.yml",
    "<%= config.bin %> <%= command.id %> ci-child-pipeline.yml -c parent.yml --dry-run",
  ];

  static override flags = {
    config: Flags.string({
      char: "c",
      description: "Base configuration document (default: $STAGECRAFT_BASE_CONFIG or .gitlab-ci.yml)",
    }),
    "trigger-job": Flags.string({
      description: "Job in the base configuration whose variables are inherited",
    }),
    "dry-run": Flags.boolean({
      description: "Print the result instead of rewriting the file",
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PipelineInject);

    try {
      const env = loadEnvConfig();
      getLogger(loggerConfigFor(env));
      const result = await runPipeline(`inject-${Date.now()}`, () =>
        injectPipeline({
          documentPath: args.document,
          baseConfigPath: flags.config ?? env.baseConfigPath,
          triggerJob: flags["trigger-job"] ?? env.triggerJob,
          dryRun: flags["dry-run"],
        })
      );

      if (!result.written) {
        process.stdout.write(result.text);
        return;
      }

      this.log(chalk.green(`Base configuration injected into ${args.document}`));
      this.log(`  Jobs: ${Object.keys(result.document.jobs).length}`);
      this.log(`  Variables: ${Object.keys(result.document.variables).length}`);
    } catch (error) {
      this.error(`Injection failed: ${describeError(error)}`, { exit: exitCodeFor(error) });
    }
  }
}
