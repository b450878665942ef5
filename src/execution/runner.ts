import { resolve } from "node:path";
import debug from "debug";
import { parseCommand } from "../core/parser";
import { DependencyResolver } from "../core/resolver";
import { buildRegistry, DEFAULT_RUNFILE, loadRunfile, runfileVariables } from "../core/runfile";
import { type CaptureFn, VariableEnvironment } from "../core/variables";
import { isMakewayError } from "../errors";
import { ReleasePipeline } from "../release/pipeline";
import { ReleaseTargetName } from "../release/targets";
import type { ExecutionReport, RunOptions } from "../types";
import { renderHelp, renderTargetList } from "../utils/help";
import { Logger } from "../utils/logger";
import type { CommandRunner } from "./command-runner";
import { Executor } from "./executor";

const log = debug("makeway:runner");

export const EXIT_SUCCESS = 0;
const EXIT_UNEXPECTED = 1;

export type RunnerDependencies = {
  runner?: CommandRunner;
  capture?: CaptureFn;
};

export class Runner {
  private readonly dependencies: RunnerDependencies;

  constructor(dependencies: RunnerDependencies = {}) {
    this.dependencies = dependencies;
  }

  /**
   * Parse arguments, load the runfile and run the requested targets.
   * Resolves to the process exit code.
   */
  async run(args: string[], options: RunOptions = {}): Promise<number> {
    try {
      const parsed = parseCommand(args);
      const config = { ...parsed.config, ...options };
      const baseDir = options.cwd ?? process.cwd();
      const cwd = parsed.directory ? resolve(baseDir, parsed.directory) : baseDir;
      const runfilePath = resolve(cwd, parsed.file ?? DEFAULT_RUNFILE);

      const runfile = await loadRunfile(runfilePath);
      const registry = buildRegistry(runfile);
      log(`Loaded ${registry.names().length} targets from ${runfilePath}`);

      if (parsed.list && !parsed.help) {
        console.log(renderTargetList(registry));
        return EXIT_SUCCESS;
      }

      const targets =
        parsed.targets.length > 0 ? parsed.targets : runfile.default ? [runfile.default] : [];
      // `help` is built in unless the runfile declares its own
      const wantsHelp =
        parsed.help ||
        targets.length === 0 ||
        (targets.length === 1 && targets[0] === "help" && !registry.has("help"));
      if (wantsHelp) {
        console.log(renderHelp(registry));
        return EXIT_SUCCESS;
      }

      const env = VariableEnvironment.create(runfileVariables(runfile), {
        cwd,
        overrides: { ...options.variables, ...parsed.variables },
        ...(this.dependencies.capture && { capture: this.dependencies.capture }),
      });
      const logger = new Logger(config);
      const executorOptions = {
        ...config,
        cwd,
        logger,
        ...(this.dependencies.runner && { runner: this.dependencies.runner }),
      };

      let report: ExecutionReport;
      if (runfile.release && targets.length === 1 && targets[0] === ReleaseTargetName.release) {
        const pipeline = new ReleasePipeline(registry, runfile.release, executorOptions);
        pipeline.onTransition((_from, to) => logger.info(`Release: ${to}`));
        report = await pipeline.run(env);
      } else {
        const resolver = new DependencyResolver(registry);
        const plan = resolver.plan(targets);
        report = await new Executor(resolver, executorOptions).execute(plan, env);
      }

      return this.summarize(report, logger);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Error:", message);
      return isMakewayError(error) ? error.exitCode : EXIT_UNEXPECTED;
    }
  }

  private summarize(report: ExecutionReport, logger: Logger): number {
    if (report.status === "success") {
      return EXIT_SUCCESS;
    }
    if (report.failure) {
      const { target, command, exitCode } = report.failure;
      logger.failure(
        `${target}: '${command}' ${exitCode === null ? "did not exit normally" : `exited with code ${exitCode}`}`
      );
    } else if (report.error) {
      logger.failure(report.error.message);
    }
    return report.error?.exitCode ?? EXIT_UNEXPECTED;
  }
}
