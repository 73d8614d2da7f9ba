import micromatch from "micromatch";
import { UnknownTargetError } from "../errors";
import type { Target } from "../types";

const GLOB_CHARS = /[*?[\]{}]/;

export class PatternMatcher {
  /**
   * Resolves patterns to target names
   * Handles inclusions and exclusions in left-to-right order
   */
  resolvePatterns(patterns: string[], targets: Target[]): string[] {
    const targetNames = targets.map((t) => t.name);
    let result: string[] = [];

    for (const pattern of patterns) {
      result = pattern.startsWith("!")
        ? this.processExclusion(pattern.slice(1), result)
        : [...result, ...this.findMatches(pattern, targetNames)];
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

  private findMatches(pattern: string, targetNames: string[]): string[] {
    // Exact names win over glob interpretation
    if (targetNames.includes(pattern)) {
      return [pattern];
    }

    if (this.isGlobPattern(pattern)) {
      const matches = micromatch(targetNames, pattern);
      if (matches.length > 0) {
        return matches;
      }
    }

    throw new UnknownTargetError(pattern);
  }

  private isGlobPattern(pattern: string): boolean {
    return GLOB_CHARS.test(pattern);
  }
}
