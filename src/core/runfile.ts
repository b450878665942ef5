import { readFile } from "node:fs/promises";
import debug from "debug";
import { z } from "zod";
import { RunfileError } from "../errors";
import {
  createReleaseTargets,
  ReleaseConfig,
  RELEASE_SECTION,
  releaseVariables,
} from "../release/targets";
import type { TargetCommand, Target, Variable } from "../types";
import { TargetRegistry } from "./registry";

const log = debug("makeway:runfile");

export const DEFAULT_RUNFILE = "runfile.json";

const TargetName = z.string().regex(/^[A-Za-z0-9_.:/-]+$/, "invalid target name");

const CommandEntry = z.union([
  z.string().min(1),
  z
    .object({
      run: z.union([z.string().min(1), z.array(z.string()).nonempty()]),
      ignoreFailure: z.boolean().default(false),
      silent: z.boolean().default(false),
      substitute: z.boolean().default(true),
    })
    .strict(),
  z
    .object({
      invoke: z.array(TargetName).nonempty(),
      vars: z.record(z.string()).default({}),
      ignoreFailure: z.boolean().default(false),
    })
    .strict(),
]);
type CommandEntry = z.infer<typeof CommandEntry>;

const VariableEntry = z.union([
  z.string(),
  z.array(z.string()),
  z
    .object({
      value: z.union([z.string(), z.array(z.string())]),
      export: z.boolean().default(false),
    })
    .strict(),
  z
    .object({
      shell: z.string().min(1),
      export: z.boolean().default(false),
    })
    .strict(),
]);
type VariableEntry = z.infer<typeof VariableEntry>;

const TargetEntry = z.union([
  z.object({ section: z.string().min(1) }).strict(),
  z
    .object({
      name: TargetName,
      description: z.string().optional(),
      deps: z.array(TargetName).default([]),
      commands: z.array(CommandEntry).default([]),
    })
    .strict(),
]);

export const Runfile = z
  .object({
    default: TargetName.optional(),
    variables: z.record(VariableEntry).default({}),
    targets: z.array(TargetEntry).default([]),
    release: ReleaseConfig.optional(),
  })
  .strict();
export type Runfile = z.infer<typeof Runfile>;

export async function loadRunfile(path: string): Promise<Runfile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RunfileError(path, [message]);
  }
  log(`Loaded ${path} (${raw.length} bytes)`);

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RunfileError(path, [message]);
  }
  return parseRunfile(json, path);
}

export function parseRunfile(json: unknown, path = DEFAULT_RUNFILE): Runfile {
  const parsed = Runfile.safeParse(json);
  if (!parsed.success) {
    throw new RunfileError(
      path,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function toCommand(entry: CommandEntry): TargetCommand {
  if (typeof entry === "string") {
    return { ignoreFailure: false, kind: "shell", line: entry, silent: false, substitute: true };
  }
  if ("invoke" in entry) {
    return {
      ignoreFailure: entry.ignoreFailure,
      kind: "invoke",
      targets: entry.invoke,
      variables: entry.vars,
    };
  }
  const flags = {
    ignoreFailure: entry.ignoreFailure,
    silent: entry.silent,
    substitute: entry.substitute,
  };
  return typeof entry.run === "string"
    ? { ...flags, kind: "shell", line: entry.run }
    : { ...flags, argv: entry.run, kind: "exec" };
}

function toVariable(name: string, entry: VariableEntry): Variable {
  if (typeof entry === "string" || Array.isArray(entry)) {
    return { name, value: { kind: "literal", value: entry } };
  }
  if ("shell" in entry) {
    return { exported: entry.export, name, value: { command: entry.shell, kind: "derived" } };
  }
  return { exported: entry.export, name, value: { kind: "literal", value: entry.value } };
}

/**
 * Root-scope variables. A release block adds `TAG` and `ARTIFACT` unless
 * the runfile defines them itself.
 */
export function runfileVariables(runfile: Runfile): Variable[] {
  const declared = Object.entries(runfile.variables).map(([name, entry]) => toVariable(name, entry));
  if (!runfile.release) {
    return declared;
  }
  const added = releaseVariables(runfile.release).filter(
    (variable) => !(variable.name in runfile.variables)
  );
  return [...declared, ...added];
}

/**
 * Register every declared target (plus the release targets when the
 * runfile configures a release) and check that all references resolve.
 */
export function buildRegistry(runfile: Runfile): TargetRegistry {
  const registry = new TargetRegistry();

  for (const entry of runfile.targets) {
    if ("section" in entry) {
      registry.addSection(entry.section);
      continue;
    }
    const target: Target = {
      alwaysRun: true,
      commands: entry.commands.map(toCommand),
      name: entry.name,
      prerequisites: entry.deps,
      ...(entry.description !== undefined && { description: entry.description }),
    };
    registry.register(target);
  }

  if (runfile.release) {
    registry.addSection(RELEASE_SECTION);
    for (const target of createReleaseTargets(runfile.release)) {
      registry.register(target);
    }
  }

  registry.validate();
  return registry;
}
