export { Runner } from "./execution/runner";
export { Parser, parseCommand } from "./core/parser";
export { PatternMatcher } from "./core/pattern-matcher";
export { TargetRegistry } from "./core/registry";
export { DependencyResolver } from "./core/resolver";
export { VariableEnvironment, shellCapture } from "./core/variables";
export { buildRegistry, loadRunfile, parseRunfile, runfileVariables } from "./core/runfile";
export { Executor } from "./execution/executor";
export { ExecaCommandRunner, formatCommand } from "./execution/command-runner";
export { ReleasePipeline, RELEASE_STATES } from "./release/pipeline";
export { createReleaseTargets, ReleaseConfig, releaseVariables } from "./release/targets";
export { renderHelp, renderTargetList } from "./utils/help";
export { Logger, TargetLogger } from "./utils/logger";
export * from "./errors";

export type {
  Config,
  ParsedCommand,
  TargetCommand,
  ShellCommand,
  ExecCommand,
  InvokeCommand,
  Target,
  Variable,
  VariableValue,
  HelpEntry,
  ExecutionPlan,
  ExecutionReport,
  ExecutionHooks,
  TargetResult,
  CommandResult,
  FailureRecord,
  RunOptions,
} from "./types";
export type { CaptureFn, CaptureResult } from "./core/variables";
export type { CommandRunner, CommandInvocation, CommandOutcome, ResolvedCommand } from "./execution/command-runner";
export type { ExecutorOptions } from "./execution/executor";
export type { ReleaseReport, ReleaseState, TransitionListener } from "./release/pipeline";
export type { Runfile } from "./core/runfile";
