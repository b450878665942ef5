import type { MakewayError } from "./errors";

export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
  jobs?: number;
  dryRun?: boolean;
};

export type ParsedCommand = {
  targets: string[];
  variables: Record<string, string>;
  config: Config;
  file?: string;
  directory?: string;
  help?: boolean;
  list?: boolean;
};

type CommandFlags = {
  ignoreFailure: boolean;
  silent: boolean;
  substitute: boolean;
};

export type ShellCommand = CommandFlags & {
  kind: "shell";
  line: string;
};

export type ExecCommand = CommandFlags & {
  kind: "exec";
  argv: string[];
};

export type InvokeCommand = {
  kind: "invoke";
  targets: string[];
  variables: Record<string, string>;
  ignoreFailure: boolean;
};

export type TargetCommand = ShellCommand | ExecCommand | InvokeCommand;

export type Target = {
  name: string;
  prerequisites: string[];
  commands: TargetCommand[];
  description?: string;
  alwaysRun: boolean;
  section?: string;
};

export type VariableValue =
  | { kind: "literal"; value: string | string[] }
  | { kind: "derived"; command: string };

export type Variable = {
  name: string;
  value: VariableValue;
  exported?: boolean;
};

export type HelpEntry =
  | { kind: "section"; title: string }
  | { kind: "target"; name: string; description: string };

export type ExecutionPlan = {
  requested: string[];
  targets: Target[];
};

export type CommandResult = {
  command: string;
  exitCode: number | null;
  suppressed: boolean;
};

export type TargetStatus = "success" | "failure" | "cancelled" | "skipped";

export type TargetResult = {
  target: string;
  status: TargetStatus;
  commands: CommandResult[];
};

export type FailureRecord = {
  target: string;
  command: string;
  exitCode: number | null;
};

export type ExecutionReport = {
  status: "success" | "failure" | "cancelled";
  results: TargetResult[];
  failure?: FailureRecord;
  error?: MakewayError;
  durationMs: number;
};

export interface ExecutionHooks {
  onTargetStart?: (target: Target) => void;
  onTargetFinish?: (result: TargetResult) => void;
}

export interface RunOptions extends Config, ExecutionHooks {
  cwd?: string;
  env?: Record<string, string>;
  variables?: Record<string, string>;
  signal?: AbortSignal;
}
