import debug from "debug";
import type { DependencyResolver } from "../core/resolver";
import type { VariableEnvironment } from "../core/variables";
import {
  CancelledError,
  CommandFailure,
  CyclicDependencyError,
  isMakewayError,
  type MakewayError,
} from "../errors";
import type {
  CommandResult,
  TargetCommand,
  ExecutionPlan,
  ExecutionReport,
  InvokeCommand,
  RunOptions,
  Target,
  TargetResult,
} from "../types";
import { Logger, type TargetLogger } from "../utils/logger";
import {
  type CommandRunner,
  ExecaCommandRunner,
  formatCommand,
  type ResolvedCommand,
} from "./command-runner";

const log = debug("makeway:executor");

export interface ExecutorOptions extends RunOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

export class Executor {
  private readonly resolver: DependencyResolver;
  private readonly options: ExecutorOptions;
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private results: TargetResult[] = [];

  constructor(resolver: DependencyResolver, options: ExecutorOptions = {}) {
    this.resolver = resolver;
    this.options = options;
    this.logger = options.logger ?? new Logger(options);
    this.runner = options.runner ?? new ExecaCommandRunner();
  }

  /**
   * Run a plan to completion or to its first unsuppressed failure. Never
   * throws for failures of the run itself; they are recorded in the report.
   */
  async execute(plan: ExecutionPlan, env: VariableEnvironment): Promise<ExecutionReport> {
    const startedAt = Date.now();
    this.results = [];

    log("=== Starting execution ===");
    log("Plan:", plan.targets.map((t) => t.name));

    for (const target of plan.targets) {
      this.logger.registerTarget(target.name);
    }

    let error: MakewayError | undefined;
    try {
      const jobs = this.options.jobs ?? 1;
      if (jobs > 1) {
        await this.runParallel(plan, env, jobs);
      } else {
        await this.runSequential(plan, env);
      }
    } catch (err) {
      if (!isMakewayError(err)) {
        throw err;
      }
      error = err;
    }

    const started = new Set(this.results.map((r) => r.target));
    for (const target of plan.targets) {
      if (!started.has(target.name)) {
        this.results.push({ commands: [], status: "skipped", target: target.name });
      }
    }

    const report: ExecutionReport = {
      durationMs: Date.now() - startedAt,
      results: this.results,
      status: error ? (error instanceof CancelledError ? "cancelled" : "failure") : "success",
      ...(error && { error }),
      ...(error instanceof CommandFailure && {
        failure: {
          command: error.command,
          exitCode: error.commandExitCode,
          target: error.target,
        },
      }),
    };
    log("=== Execution finished ===", report.status);
    return report;
  }

  private async runSequential(
    plan: ExecutionPlan,
    env: VariableEnvironment,
    chain: string[] = []
  ): Promise<void> {
    for (const target of plan.targets) {
      await this.runTarget(target, env, chain);
    }
  }

  /**
   * Bounded fan-out: a target starts once every prerequisite succeeded and
   * a slot is free. After the first failure nothing new starts and the
   * targets already running are awaited.
   */
  private async runParallel(
    plan: ExecutionPlan,
    env: VariableEnvironment,
    jobs: number
  ): Promise<void> {
    const graph = this.resolver.graph(plan);
    const pending = plan.targets.map((t) => t.name);
    const done = new Set<string>();
    const running = new Map<string, Promise<void>>();
    let failure: unknown;

    const isReady = (name: string): boolean => {
      const prerequisites = graph.successors(name);
      return !Array.isArray(prerequisites) || prerequisites.every((dep) => done.has(dep));
    };

    while (pending.length > 0 || running.size > 0) {
      if (failure === undefined && !this.options.signal?.aborted) {
        for (const name of [...pending]) {
          if (running.size >= jobs) {
            break;
          }
          const target = plan.targets.find((t) => t.name === name);
          if (!(target && isReady(name))) {
            continue;
          }
          pending.splice(pending.indexOf(name), 1);
          log(`Starting ${name} (${running.size + 1}/${jobs} slots)`);
          const task = this.runTarget(target, env)
            .then(() => {
              done.add(name);
            })
            .catch((err: unknown) => {
              failure ??= err;
            })
            .finally(() => {
              running.delete(name);
            });
          running.set(name, task);
        }
      }

      if (running.size === 0) {
        break;
      }
      await Promise.race(running.values());
    }

    if (failure !== undefined) {
      throw failure;
    }
    if (pending.length > 0) {
      throw new CancelledError(pending[0]);
    }
  }

  /**
   * `chain` lists the targets whose `invoke` led here, outermost first.
   */
  private async runTarget(
    target: Target,
    env: VariableEnvironment,
    chain: string[] = []
  ): Promise<void> {
    this.ensureNotCancelled(target.name);
    const path = [...chain, target.name];

    const logger = this.logger.createTargetLogger(target.name);
    const result: TargetResult = { commands: [], status: "success", target: target.name };

    log(`\n=== Running target: ${target.name} ===`);
    this.options.onTargetStart?.(target);
    if (target.commands.length > 0) {
      this.logger.info(`Running: ${target.name}`);
    }

    try {
      for (const command of target.commands) {
        this.ensureNotCancelled(target.name);
        result.commands.push(await this.runCommand(target, command, env, logger, path));
      }
    } catch (err) {
      result.status = err instanceof CancelledError ? "cancelled" : "failure";
      if (err instanceof CommandFailure && err.target === target.name) {
        this.logger.failure(`Failed: ${target.name} (${err.message})`);
      }
      throw err;
    } finally {
      this.results.push(result);
      this.options.onTargetFinish?.(result);
    }

    if (target.commands.length > 0) {
      this.logger.success(`Completed: ${target.name}`);
    }
  }

  private async runCommand(
    target: Target,
    command: TargetCommand,
    env: VariableEnvironment,
    logger: TargetLogger,
    path: string[]
  ): Promise<CommandResult> {
    if (command.kind === "invoke") {
      return this.runInvoke(target, command, env, logger, path);
    }

    const resolved: ResolvedCommand =
      command.kind === "shell"
        ? {
            kind: "shell",
            line: command.substitute ? await env.substitute(command.line) : command.line,
          }
        : {
            argv: command.substitute
              ? await Promise.all(command.argv.map((arg) => env.substitute(arg)))
              : command.argv,
            kind: "exec",
          };
    const display = formatCommand(resolved);

    if (!command.silent || this.options.dryRun) {
      logger.command(display);
    }
    if (this.options.dryRun) {
      return { command: display, exitCode: 0, suppressed: false };
    }

    const { exitCode } = await this.runner.run({
      command: resolved,
      cwd: this.options.cwd ?? process.cwd(),
      env: { ...(await env.exportedEnv()), ...this.options.env },
      logger,
    });

    if (exitCode === 0) {
      return { command: display, exitCode, suppressed: false };
    }
    if (command.ignoreFailure) {
      this.logger.warn(
        `Ignored failure in ${target.name} (exit ${exitCode ?? "none"}): ${display}`
      );
      return { command: display, exitCode, suppressed: true };
    }
    throw new CommandFailure(target.name, display, exitCode);
  }

  /**
   * Nested invocation with extra variable bindings. Its plan is separate
   * from the enclosing one, so targets it names run even when the outer
   * plan already ran them.
   */
  private async runInvoke(
    target: Target,
    command: InvokeCommand,
    env: VariableEnvironment,
    logger: TargetLogger,
    path: string[]
  ): Promise<CommandResult> {
    const bindings = Object.entries(command.variables).map(([k, v]) => `${k}=${v}`);
    const display = [...command.targets, ...bindings].join(" ");
    logger.command(`invoke ${display}`);

    const plan = this.resolver.plan(command.targets);
    for (const planned of plan.targets) {
      const start = path.indexOf(planned.name);
      if (start !== -1) {
        throw new CyclicDependencyError([...path.slice(start), planned.name]);
      }
    }
    const scope = env.child(command.variables);
    for (const name of plan.targets.map((t) => t.name)) {
      this.logger.registerTarget(name);
    }

    try {
      await this.runSequential(plan, scope, path);
    } catch (err) {
      if (err instanceof CommandFailure && command.ignoreFailure) {
        this.logger.warn(`Ignored failure in ${target.name}: ${err.message}`);
        return { command: display, exitCode: err.commandExitCode, suppressed: true };
      }
      throw err;
    }
    return { command: display, exitCode: 0, suppressed: false };
  }

  private ensureNotCancelled(targetName: string): void {
    if (this.options.signal?.aborted) {
      throw new CancelledError(targetName);
    }
  }
}
