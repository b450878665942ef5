/**
 * Error taxonomy. Every error aborts the current invocation; the only
 * local recovery is a command line marked `ignoreFailure`.
 */

export type ErrorCode =
  | "UNKNOWN_TARGET"
  | "DUPLICATE_TARGET"
  | "CYCLIC_DEPENDENCY"
  | "VARIABLE_RESOLUTION"
  | "RUNFILE_INVALID"
  | "USAGE"
  | "COMMAND_FAILED"
  | "CANCELLED";

export type SerializedError = {
  name: string;
  message: string;
  code: ErrorCode;
  exitCode: number;
  details?: Record<string, unknown>;
};

const GENERIC_FAILURE_EXIT_CODE = 1;
const USAGE_EXIT_CODE = 2;
const INTERRUPTED_EXIT_CODE = 130;

export class MakewayError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    exitCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "MakewayError";
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      details: this.details,
      exitCode: this.exitCode,
      message: this.message,
      name: this.name,
    };
  }
}

export class UnknownTargetError extends MakewayError {
  readonly target: string;

  constructor(target: string, options: { referencedBy?: string; suggestion?: string } = {}) {
    let message = options.referencedBy
      ? `Unknown target '${target}' (prerequisite of '${options.referencedBy}')`
      : `Unknown target '${target}'`;
    if (options.suggestion) {
      message += `. Did you mean '${options.suggestion}'?`;
    }
    super(message, "UNKNOWN_TARGET", USAGE_EXIT_CODE, { target, ...options });
    this.name = "UnknownTargetError";
    this.target = target;
  }
}

export class DuplicateTargetError extends MakewayError {
  readonly target: string;

  constructor(target: string) {
    super(`Target '${target}' is already declared`, "DUPLICATE_TARGET", USAGE_EXIT_CODE, {
      target,
    });
    this.name = "DuplicateTargetError";
    this.target = target;
  }
}

export class CyclicDependencyError extends MakewayError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(
      `Circular dependency detected: ${cycle.join(" -> ")}`,
      "CYCLIC_DEPENDENCY",
      USAGE_EXIT_CODE,
      { cycle }
    );
    this.name = "CyclicDependencyError";
    this.cycle = cycle;
  }
}

export class VariableResolutionError extends MakewayError {
  readonly variable: string;

  constructor(variable: string, reason: string) {
    super(
      `Cannot resolve variable '${variable}': ${reason}`,
      "VARIABLE_RESOLUTION",
      USAGE_EXIT_CODE,
      { reason, variable }
    );
    this.name = "VariableResolutionError";
    this.variable = variable;
  }
}

export class RunfileError extends MakewayError {
  readonly path: string;

  constructor(path: string, issues: string[]) {
    super(`Invalid runfile ${path}:\n  ${issues.join("\n  ")}`, "RUNFILE_INVALID", USAGE_EXIT_CODE, {
      issues,
      path,
    });
    this.name = "RunfileError";
    this.path = path;
  }
}

export class UsageError extends MakewayError {
  constructor(message: string) {
    super(message, "USAGE", USAGE_EXIT_CODE);
    this.name = "UsageError";
  }
}

export class CommandFailure extends MakewayError {
  readonly target: string;
  readonly command: string;
  readonly commandExitCode: number | null;

  constructor(target: string, command: string, exitCode: number | null) {
    const status = exitCode === null ? "ended without an exit status" : `exited with code ${exitCode}`;
    super(
      `Command in target '${target}' ${status}: ${command}`,
      "COMMAND_FAILED",
      exitCode !== null && exitCode > 0 ? exitCode : GENERIC_FAILURE_EXIT_CODE,
      { command, exitCode, target }
    );
    this.name = "CommandFailure";
    this.target = target;
    this.command = command;
    this.commandExitCode = exitCode;
  }
}

export class CancelledError extends MakewayError {
  readonly target?: string;

  constructor(target?: string) {
    super(
      target ? `Run cancelled before continuing '${target}'` : "Run cancelled",
      "CANCELLED",
      INTERRUPTED_EXIT_CODE,
      target ? { target } : undefined
    );
    this.name = "CancelledError";
    this.target = target;
  }
}

export function isMakewayError(value: unknown): value is MakewayError {
  return value instanceof MakewayError;
}
