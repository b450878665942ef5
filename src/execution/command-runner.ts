import { delimiter, join } from "node:path";
import debug from "debug";
import { execa } from "execa";
import type { TargetLogger } from "../utils/logger";

const log = debug("makeway:process");

export type ResolvedCommand =
  | { kind: "shell"; line: string }
  | { kind: "exec"; argv: string[] };

export type CommandInvocation = {
  command: ResolvedCommand;
  cwd: string;
  env: Record<string, string>;
  logger: TargetLogger;
};

export type CommandOutcome = {
  // null when the process never started or was killed by a signal
  exitCode: number | null;
};

export interface CommandRunner {
  run(invocation: CommandInvocation): Promise<CommandOutcome>;
}

const SAFE_ARG = /^[\w@%+=:,./-]+$/;

export function formatCommand(command: ResolvedCommand): string {
  if (command.kind === "shell") {
    return command.line;
  }
  return command.argv
    .map((arg) => (SAFE_ARG.test(arg) ? arg : `'${arg.replaceAll("'", "'\\''")}'`))
    .join(" ");
}

/**
 * Runs each command in its own subprocess and streams its output through
 * the target logger as it arrives.
 */
export class ExecaCommandRunner implements CommandRunner {
  async run({ command, cwd, env, logger }: CommandInvocation): Promise<CommandOutcome> {
    const npmBinPath = join(cwd, "node_modules", ".bin");
    const enhancedPath = npmBinPath + delimiter + (env.PATH ?? process.env.PATH ?? "");

    const options = {
      cwd,
      env: {
        ...process.env,
        ...env,
        PATH: enhancedPath,
      },
      reject: false,
      stdin: "inherit",
      stdout: "pipe",
      stderr: "pipe",
    } as const;

    log(`Spawning in ${cwd}: ${formatCommand(command)}`);
    const proc =
      command.kind === "shell"
        ? execa(command.line, { ...options, shell: true })
        : execa(command.argv[0] ?? "", command.argv.slice(1), options);

    proc.stdout?.on("data", (data: Buffer) => {
      logger.write("stdout", data.toString());
    });
    proc.stderr?.on("data", (data: Buffer) => {
      logger.write("stderr", data.toString());
    });

    const result = await proc;
    logger.flush();

    if (typeof result.exitCode !== "number") {
      logger.error(`No exit status (not started or killed): ${formatCommand(command)}`);
      return { exitCode: null };
    }
    log(`Exited with ${result.exitCode}: ${formatCommand(command)}`);
    return { exitCode: result.exitCode };
  }
}
