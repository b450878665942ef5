import { UsageError } from "../errors";
import type { ParsedCommand } from "../types";

const VARIABLE_ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_.-]*)=(.*)$/s;
const VALUE_FLAGS = new Set(["j", "f", "C"]);

export class Parser {
  private warnings: string[] = [];

  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      config: {},
      targets: [],
      variables: {},
    };
    this.warnings = [];

    const queue = [...args];
    while (queue.length > 0) {
      const arg = queue.shift() ?? "";
      this.processArg(arg, queue, result);
    }

    for (const warning of this.warnings) {
      console.warn(warning);
    }
    return result;
  }

  private processArg(arg: string, queue: string[], result: ParsedCommand): void {
    if (arg === "--") {
      // Everything after -- is a target name, even if it starts with a dash
      result.targets.push(...queue.splice(0));
      return;
    }
    if (arg.startsWith("--")) {
      this.processLongFlag(arg.substring(2), queue, result);
      return;
    }
    if (arg.startsWith("-") && arg.length > 1) {
      this.processShortFlags(arg.substring(1), queue, result);
      return;
    }

    const assignment = arg.match(VARIABLE_ASSIGNMENT);
    if (assignment?.[1] !== undefined && assignment[2] !== undefined) {
      result.variables[assignment[1]] = assignment[2];
      return;
    }
    result.targets.push(arg);
  }

  private processLongFlag(flag: string, queue: string[], result: ParsedCommand): void {
    const [name = "", inlineValue] = splitOnce(flag, "=");
    const takeValue = (): string => {
      const value = inlineValue ?? queue.shift();
      if (value === undefined) {
        throw new UsageError(`Flag --${name} requires a value`);
      }
      return value;
    };

    switch (name) {
      case "help":
        result.help = true;
        break;
      case "list":
        result.list = true;
        break;
      case "quiet":
        result.config.quiet = true;
        break;
      case "dry-run":
        result.config.dryRun = true;
        break;
      case "no-prefix":
        result.config.prefix = false;
        break;
      case "prefix":
        result.config.prefix = takeValue();
        break;
      case "jobs":
        result.config.jobs = parseJobs(takeValue());
        break;
      case "file":
        result.file = takeValue();
        break;
      case "directory":
        result.directory = takeValue();
        break;
      default:
        this.warnings.push(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, queue: string[], result: ParsedCommand): void {
    for (let i = 0; i < flags.length; i++) {
      const flag = flags.charAt(i);

      if (VALUE_FLAGS.has(flag)) {
        // A value flag takes the rest of the cluster, or the next argument
        const value = flags.slice(i + 1) || queue.shift();
        if (value === undefined) {
          throw new UsageError(`Flag -${flag} requires a value`);
        }
        this.applyValueFlag(flag, value, result);
        return;
      }

      if (flag === "h") {
        result.help = true;
      } else if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "n") {
        result.config.dryRun = true;
      } else {
        this.warnings.push(`Unknown flag: -${flag}`);
      }
    }
  }

  private applyValueFlag(flag: string, value: string, result: ParsedCommand): void {
    if (flag === "j") {
      result.config.jobs = parseJobs(value);
    } else if (flag === "f") {
      result.file = value;
    } else {
      result.directory = value;
    }
  }
}

function splitOnce(input: string, separator: string): [string, string | undefined] {
  const index = input.indexOf(separator);
  return index === -1 ? [input, undefined] : [input.slice(0, index), input.slice(index + 1)];
}

function parseJobs(value: string): number {
  const jobs = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new UsageError(`Invalid job count: ${value}`);
  }
  return jobs;
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}
