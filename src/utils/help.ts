import ansis from "ansis";
import type { TargetRegistry } from "../core/registry";

export const HELP_COLUMN_WIDTH = 30;

export type HelpOptions = {
  color?: boolean;
  width?: number;
};

/**
 * One line per documented target, grouped under section headers in
 * declaration order. Only reads the registry.
 */
export function renderHelp(registry: TargetRegistry, options: HelpOptions = {}): string {
  const color = options.color ?? true;
  const width = options.width ?? HELP_COLUMN_WIDTH;
  const lines: string[] = [];

  for (const entry of registry.listDocumented()) {
    if (entry.kind === "section") {
      lines.push("");
      lines.push(color ? ansis.bold.red(entry.title) : entry.title);
      continue;
    }
    const name = entry.name.padEnd(width);
    lines.push(`${color ? ansis.yellow(name) : name} ${entry.description}`);
  }

  return lines.join("\n");
}

export function renderTargetList(registry: TargetRegistry): string {
  return registry
    .listDocumented()
    .flatMap((entry) => (entry.kind === "target" ? [entry.name] : []))
    .join("\n");
}
