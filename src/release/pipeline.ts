import debug from "debug";
import { DependencyResolver } from "../core/resolver";
import type { TargetRegistry } from "../core/registry";
import type { VariableEnvironment } from "../core/variables";
import { isMakewayError } from "../errors";
import { Executor, type ExecutorOptions } from "../execution/executor";
import type { ExecutionReport, TargetResult } from "../types";
import { type ReleaseConfig, ReleaseTargetName } from "./targets";

const log = debug("makeway:release");

export const RELEASE_STATES = [
  "idle",
  "versioned",
  "tagged",
  "pushed",
  "packaged",
  "validated",
  "published",
  "done",
] as const;

export type ReleaseState = (typeof RELEASE_STATES)[number] | "failed";

const STATE_AFTER_TARGET: Record<string, ReleaseState> = {
  [ReleaseTargetName.tag]: "tagged",
  [ReleaseTargetName.push]: "pushed",
  [ReleaseTargetName.package]: "packaged",
  [ReleaseTargetName.check]: "validated",
  [ReleaseTargetName.publish]: "published",
};

export type TransitionListener = (from: ReleaseState, to: ReleaseState) => void;

export type ReleaseReport = ExecutionReport & {
  state: ReleaseState;
  version?: string;
};

/**
 * Drives the `release` target and tracks how far it got. `failed` is
 * terminal; there is no retry. Re-running is safe because every release
 * step is idempotent.
 */
export class ReleasePipeline {
  private readonly registry: TargetRegistry;
  private readonly config: ReleaseConfig;
  private readonly options: ExecutorOptions;
  private readonly listeners: TransitionListener[] = [];
  private current: ReleaseState = "idle";

  constructor(registry: TargetRegistry, config: ReleaseConfig, options: ExecutorOptions = {}) {
    this.registry = registry;
    this.config = config;
    this.options = options;
  }

  get state(): ReleaseState {
    return this.current;
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  async run(env: VariableEnvironment): Promise<ReleaseReport> {
    const startedAt = Date.now();
    if (this.current !== "idle") {
      throw new Error(`Release pipeline already ran (state: ${this.current})`);
    }

    let version: string;
    try {
      version = await env.resolve(this.config.version);
    } catch (error) {
      if (!isMakewayError(error)) {
        throw error;
      }
      this.transition("failed");
      return {
        durationMs: Date.now() - startedAt,
        error,
        results: [],
        state: this.current,
        status: "failure",
      };
    }
    log(`Releasing version ${version}`);
    this.transition("versioned");

    const resolver = new DependencyResolver(this.registry);
    const executor = new Executor(resolver, {
      ...this.options,
      onTargetFinish: (result: TargetResult) => {
        this.options.onTargetFinish?.(result);
        this.advance(result);
      },
    });

    let report: ExecutionReport;
    try {
      report = await executor.execute(resolver.plan([ReleaseTargetName.release]), env);
    } catch (error) {
      this.transition("failed");
      throw error;
    }

    this.transition(report.status === "success" ? "done" : "failed");
    return { ...report, state: this.current, version };
  }

  /**
   * Only release steps move the state. A gate target that fails inside a
   * suppressed invocation leaves it alone; one that fails the run is
   * settled when `run` finishes.
   */
  private advance(result: TargetResult): void {
    const next = STATE_AFTER_TARGET[result.target];
    if (!next) {
      return;
    }
    if (result.status === "failure" || result.status === "cancelled") {
      this.transition("failed");
    } else if (result.status === "success" && rank(next) > rank(this.current)) {
      this.transition(next);
    }
  }

  private transition(to: ReleaseState): void {
    const from = this.current;
    if (from === to || from === "failed") {
      return;
    }
    log(`${from} -> ${to}`);
    this.current = to;
    for (const listener of this.listeners) {
      listener(from, to);
    }
  }
}

function rank(state: ReleaseState): number {
  return state === "failed" ? -1 : RELEASE_STATES.indexOf(state);
}
