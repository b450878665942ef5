import debug from "debug";
import { execa } from "execa";
import { VariableResolutionError } from "../errors";
import type { Variable } from "../types";

const log = debug("makeway:variables");

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;
const TRAILING_NEWLINES = /[\r\n]+$/;

export type CaptureResult = {
  exitCode: number;
  stdout: string;
  stderr?: string;
};

export type CaptureFn = (
  command: string,
  options: { cwd: string }
) => Promise<CaptureResult>;

export const shellCapture: CaptureFn = async (command, { cwd }) => {
  const result = await execa(command, { cwd, reject: false, shell: true });
  return {
    exitCode: result.exitCode ?? 1,
    stderr: result.stderr,
    stdout: result.stdout,
  };
};

export type VariableEnvironmentOptions = {
  overrides?: Record<string, string>;
  capture?: CaptureFn;
  cwd?: string;
};

type Frame = { scope: VariableEnvironment; name: string; deriving?: boolean };

// State shared by a root scope and all of its children
type VariableStore = {
  definitions: Map<string, Variable>;
  overrides: Map<string, string>;
  cache: Map<string, Promise<string>>;
  capture: CaptureFn;
  cwd: string;
};

/**
 * Named values used by command lines. Literal values may reference other
 * variables and expand in the scope that asks for them; derived values run
 * their capture command once per process and are shared by every scope.
 */
export class VariableEnvironment {
  private readonly store: VariableStore;
  private readonly bindings: Map<string, string>;
  private readonly parent?: VariableEnvironment;

  private constructor(
    store: VariableStore,
    bindings: Map<string, string>,
    parent?: VariableEnvironment
  ) {
    this.store = store;
    this.bindings = bindings;
    this.parent = parent;
  }

  static create(
    variables: Variable[] = [],
    options: VariableEnvironmentOptions = {}
  ): VariableEnvironment {
    return new VariableEnvironment({
      cache: new Map(),
      capture: options.capture ?? shellCapture,
      cwd: options.cwd ?? process.cwd(),
      definitions: new Map(variables.map((v) => [v.name, v])),
      overrides: new Map(Object.entries(options.overrides ?? {})),
    }, new Map());
  }

  /**
   * Scope with extra bindings. Binding values are templates expanded in
   * this (the parent) scope, so `TAG=${TAG}-rc` refers to the outer TAG.
   */
  child(bindings: Record<string, string>): VariableEnvironment {
    return new VariableEnvironment(this.store, new Map(Object.entries(bindings)), this);
  }

  resolve(name: string): Promise<string> {
    return this.resolveIn(name, []);
  }

  substitute(template: string): Promise<string> {
    return this.substituteIn(template, []);
  }

  /**
   * Resolved values of every exported variable, for subprocess environments.
   */
  async exportedEnv(): Promise<Record<string, string>> {
    const env: Record<string, string> = {};
    for (const variable of this.store.definitions.values()) {
      if (variable.exported) {
        env[variable.name] = await this.resolve(variable.name);
      }
    }
    return env;
  }

  private async resolveIn(name: string, chain: Frame[]): Promise<string> {
    if (chain.some((frame) => frame.scope === this && frame.name === name)) {
      const path = [...chain.map((frame) => frame.name), name].join(" -> ");
      throw new VariableResolutionError(name, `recursive reference (${path})`);
    }
    const frames = [...chain, { name, scope: this }];

    const override = this.store.overrides.get(name);
    if (override !== undefined) {
      return this.rootScope().substituteIn(override, frames);
    }

    for (let scope: VariableEnvironment | undefined = this; scope; scope = scope.parent) {
      const binding = scope.bindings.get(name);
      if (binding !== undefined && scope.parent) {
        return scope.parent.substituteIn(binding, frames);
      }
    }

    const variable = this.store.definitions.get(name);
    if (!variable) {
      throw new VariableResolutionError(name, "not defined");
    }

    if (variable.value.kind === "literal") {
      const { value } = variable.value;
      return this.substituteIn(Array.isArray(value) ? value.join(" ") : value, frames);
    }

    return this.rootScope().derive(name, variable.value.command, frames);
  }

  private rootScope(): VariableEnvironment {
    return this.parent ? this.parent.rootScope() : this;
  }

  private derive(name: string, command: string, frames: Frame[]): Promise<string> {
    // A pending evaluation reached again from its own command would await itself
    if (frames.some((frame) => frame.deriving && frame.name === name)) {
      const path = frames.map((frame) => frame.name).join(" -> ");
      return Promise.reject(
        new VariableResolutionError(name, `recursive reference (${path})`)
      );
    }

    const cached = this.store.cache.get(name);
    if (cached) {
      return cached;
    }

    const evaluation = (async () => {
      const line = await this.substituteIn(command, [
        ...frames,
        { deriving: true, name, scope: this },
      ]);
      log(`Deriving ${name}: ${line}`);
      const result = await this.store.capture(line, { cwd: this.store.cwd });
      if (result.exitCode !== 0) {
        const detail = result.stderr?.trim();
        throw new VariableResolutionError(
          name,
          `'${line}' exited with code ${result.exitCode}${detail ? `: ${detail}` : ""}`
        );
      }
      const value = result.stdout.replace(TRAILING_NEWLINES, "");
      log(`Derived ${name} = ${value}`);
      return value;
    })();

    this.store.cache.set(name, evaluation);
    return evaluation;
  }

  private async substituteIn(template: string, chain: Frame[]): Promise<string> {
    let output = "";
    let i = 0;

    while (i < template.length) {
      const char = template.charAt(i);
      const next = template.charAt(i + 1);

      if (char === "$" && next === "$") {
        output += "$";
        i += 2;
      } else if (char === "$" && next === "{") {
        const end = template.indexOf("}", i + 2);
        if (end === -1) {
          throw new VariableResolutionError(
            template.slice(i + 2),
            `unterminated reference in '${template}'`
          );
        }
        const name = template.slice(i + 2, end);
        if (!NAME_PATTERN.test(name)) {
          throw new VariableResolutionError(name, `invalid reference in '${template}'`);
        }
        output += await this.resolveIn(name, chain);
        i = end + 1;
      } else {
        output += char;
        i++;
      }
    }

    return output;
  }
}
