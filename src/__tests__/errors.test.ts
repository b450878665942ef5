import { describe, expect, it } from "vitest";
import {
  CancelledError,
  CommandFailure,
  CyclicDependencyError,
  DuplicateTargetError,
  isMakewayError,
  MakewayError,
  RunfileError,
  UnknownTargetError,
  UsageError,
  VariableResolutionError,
} from "../errors";

describe("errors", () => {
  it("formats unknown targets with context and suggestions", () => {
    const error = new UnknownTargetError("tset", { referencedBy: "ci", suggestion: "test" });

    expect(error.message).toBe("Unknown target 'tset' (prerequisite of 'ci'). Did you mean 'test'?");
    expect(error.code).toBe("UNKNOWN_TARGET");
    expect(error.exitCode).toBe(2);
    expect(error.target).toBe("tset");
  });

  it("formats cycles as a path", () => {
    expect(new CyclicDependencyError(["a", "b", "a"]).message).toBe(
      "Circular dependency detected: a -> b -> a"
    );
  });

  it("uses the command's exit code for command failures", () => {
    expect(new CommandFailure("build", "make", 3).exitCode).toBe(3);
    expect(new CommandFailure("build", "make", null).exitCode).toBe(1);
    expect(new CommandFailure("build", "make", null).message).toBe(
      "Command in target 'build' ended without an exit status: make"
    );
  });

  it("assigns exit codes by kind", () => {
    expect(new DuplicateTargetError("a").exitCode).toBe(2);
    expect(new VariableResolutionError("x", "not defined").exitCode).toBe(2);
    expect(new RunfileError("runfile.json", ["bad"]).exitCode).toBe(2);
    expect(new UsageError("bad flag").exitCode).toBe(2);
    expect(new CancelledError().exitCode).toBe(130);
  });

  it("keeps the subclass prototype", () => {
    const error = new CancelledError("build");

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toBeInstanceOf(MakewayError);
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("Run cancelled before continuing 'build'");
  });

  it("serializes to JSON", () => {
    expect(JSON.parse(JSON.stringify(new RunfileError("runfile.json", ["targets: required"])))).toEqual({
      code: "RUNFILE_INVALID",
      details: { issues: ["targets: required"], path: "runfile.json" },
      exitCode: 2,
      message: "Invalid runfile runfile.json:\n  targets: required",
      name: "RunfileError",
    });
  });

  it("recognizes its own errors", () => {
    expect(isMakewayError(new UsageError("x"))).toBe(true);
    expect(isMakewayError(new Error("x"))).toBe(false);
    expect(isMakewayError("x")).toBe(false);
  });
});
