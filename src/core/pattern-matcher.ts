import micromatch from "micromatch";
import { UnknownTargetError } from "../errors";
import type { TargetRegistry } from "./registry";

const GLOB_CHARS = /[*?[\]{}]/;

export class PatternMatcher {
  /**
   * Resolves requested names and globs to registered target names.
   * Handles inclusions and exclusions in left-to-right order.
   */
  resolvePatterns(patterns: string[], registry: TargetRegistry): string[] {
    const targetNames = registry.names();
    let result: string[] = [];

    for (const pattern of patterns) {
      if (pattern.startsWith("!")) {
        result = this.processExclusion(pattern.slice(1), result);
      } else {
        result = [...result, ...this.findMatches(pattern, targetNames, registry)];
      }
    }

    // Remove duplicates while preserving order
    return [...new Set(result)];
  }

  private processExclusion(excludePattern: string, result: string[]): string[] {
    if (this.isGlobPattern(excludePattern)) {
      const toRemove = micromatch(result, excludePattern);
      return result.filter((name) => !toRemove.includes(name));
    }
    return result.filter((name) => name !== excludePattern);
  }

  private findMatches(
    pattern: string,
    targetNames: string[],
    registry: TargetRegistry
  ): string[] {
    if (!this.isGlobPattern(pattern)) {
      // Throws with a suggestion when the name is unknown
      return [registry.lookup(pattern).name];
    }

    const matches = micromatch(targetNames, pattern);
    if (matches.length === 0) {
      throw new UnknownTargetError(pattern);
    }
    return matches;
  }

  isGlobPattern(pattern: string): boolean {
    return GLOB_CHARS.test(pattern);
  }
}
