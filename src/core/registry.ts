import debug from "debug";
import { CyclicDependencyError, DuplicateTargetError, UnknownTargetError } from "../errors";
import type { HelpEntry, Target } from "../types";

const log = debug("makeway:registry");

// Suggest a registered name only when it is at most this many edits away
const MAX_SUGGESTION_DISTANCE = 2;

type RegistryEntry =
  | { kind: "section"; title: string }
  | { kind: "target"; target: Target };

export class TargetRegistry {
  private readonly entries: RegistryEntry[] = [];
  private readonly byName = new Map<string, Target>();
  private currentSection?: string;

  register(target: Target): void {
    if (this.byName.has(target.name)) {
      throw new DuplicateTargetError(target.name);
    }
    const registered: Target = {
      ...target,
      ...(target.section === undefined &&
        this.currentSection !== undefined && { section: this.currentSection }),
    };
    log(`Registered ${registered.name}`, registered.prerequisites);
    this.byName.set(registered.name, registered);
    this.entries.push({ kind: "target", target: registered });
  }

  /**
   * Append a section header; targets registered afterwards are grouped
   * under it in help output.
   */
  addSection(title: string): void {
    this.currentSection = title;
    this.entries.push({ kind: "section", title });
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  lookup(name: string, referencedBy?: string): Target {
    const target = this.byName.get(name);
    if (!target) {
      const suggestion = this.suggest(name);
      throw new UnknownTargetError(name, {
        ...(referencedBy !== undefined && { referencedBy }),
        ...(suggestion !== undefined && { suggestion }),
      });
    }
    return target;
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  targets(): Target[] {
    return Array.from(this.byName.values());
  }

  listDocumented(): HelpEntry[] {
    const documented: HelpEntry[] = [];
    for (const entry of this.entries) {
      if (entry.kind === "section") {
        documented.push(entry);
      } else if (entry.target.description !== undefined) {
        documented.push({
          description: entry.target.description,
          kind: "target",
          name: entry.target.name,
        });
      }
    }
    return documented;
  }

  /**
   * Check that every prerequisite and every invoked target is registered,
   * and that no target reaches itself through prerequisites or invocations.
   */
  validate(): void {
    for (const target of this.byName.values()) {
      for (const dependency of dependenciesOf(target)) {
        this.lookup(dependency, target.name);
      }
    }
    this.checkCycles();
  }

  private checkCycles(): void {
    const finished = new Set<string>();
    // Insertion-ordered, doubles as the cycle path
    const stack = new Set<string>();

    const visit = (name: string): void => {
      if (stack.has(name)) {
        const path = Array.from(stack);
        throw new CyclicDependencyError([...path.slice(path.indexOf(name)), name]);
      }
      if (finished.has(name)) {
        return;
      }
      stack.add(name);
      for (const dependency of dependenciesOf(this.lookup(name))) {
        visit(dependency);
      }
      stack.delete(name);
      finished.add(name);
    };

    for (const name of this.byName.keys()) {
      visit(name);
    }
  }

  private suggest(name: string): string | undefined {
    let best: { name: string; distance: number } | undefined;
    for (const candidate of this.byName.keys()) {
      const distance = editDistance(name, candidate);
      if (distance <= MAX_SUGGESTION_DISTANCE && (!best || distance < best.distance)) {
        best = { distance, name: candidate };
      }
    }
    return best?.name;
  }
}

// Prerequisites first, then invoked targets, in declaration order
function dependenciesOf(target: Target): string[] {
  const invoked = target.commands.flatMap((command) =>
    command.kind === "invoke" ? command.targets : []
  );
  return [...target.prerequisites, ...invoked];
}

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current.push(Math.min(substitution, insertion, deletion));
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}
