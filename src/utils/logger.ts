import ansis from "ansis";
import type { Config } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.gray,
  ansis.white,
] as const;

type LoggerConfig = Pick<Config, "quiet" | "prefix">;

export type OutputStream = "stdout" | "stderr";

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      prefix: true,
      quiet: false,
      ...config,
    };
  }

  registerTarget(targetName: string): void {
    if (!this.colorMap.has(targetName)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(targetName, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, targetName.length);
    }
  }

  log(targetName: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.log(this.formatLine(targetName, line));
    }
  }

  error(targetName: string, message: string): void {
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.error(this.formatLine(targetName, ansis.red(line)));
    }
  }

  /**
   * Echo a command line before it runs
   */
  command(targetName: string, line: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(this.formatLine(targetName, ansis.dim(`$ ${line}`)));
  }

  info(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} ${message}`);
  }

  success(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  failure(message: string): void {
    console.error(`${ansis.red("✗")} ${message}`);
  }

  private formatLine(targetName: string, line: string): string {
    if (this.config.prefix === false) {
      return line;
    }

    const color = this.colorMap.get(targetName) ?? ansis.white;

    if (typeof this.config.prefix === "string") {
      return `${color(this.config.prefix)} ${line}`;
    }
    // Pad to align the pipe separator across targets
    const prefix = `[${targetName}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2);
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }

  createTargetLogger(targetName: string): TargetLogger {
    this.registerTarget(targetName);
    return new TargetLogger(this, targetName);
  }
}

/**
 * Logger bound to one target. Subprocess output arrives in arbitrary
 * chunks; `write` holds back a partial trailing line until it completes
 * or `flush` is called.
 */
export class TargetLogger {
  private readonly parent: Logger;
  private readonly targetName: string;
  private readonly pending: Record<OutputStream, string> = { stderr: "", stdout: "" };

  constructor(parent: Logger, targetName: string) {
    this.parent = parent;
    this.targetName = targetName;
  }

  log(message: string): void {
    this.parent.log(this.targetName, message);
  }

  error(message: string): void {
    this.parent.error(this.targetName, message);
  }

  command(line: string): void {
    this.parent.command(this.targetName, line);
  }

  write(stream: OutputStream, chunk: string): void {
    const text = this.pending[stream] + chunk;
    const lastNewline = text.lastIndexOf("\n");
    if (lastNewline === -1) {
      this.pending[stream] = text;
      return;
    }
    this.pending[stream] = text.slice(lastNewline + 1);
    this.emit(stream, text.slice(0, lastNewline));
  }

  flush(): void {
    for (const stream of ["stdout", "stderr"] as const) {
      const rest = this.pending[stream];
      this.pending[stream] = "";
      if (rest) {
        this.emit(stream, rest);
      }
    }
  }

  private emit(stream: OutputStream, text: string): void {
    if (stream === "stdout") {
      this.log(text);
    } else {
      this.error(text);
    }
  }
}
