import { stat } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";

/**
 * Maps target names to the file, directory or device node whose existence
 * and modification time decide whether the target is up to date. Targets
 * without an entry have no artifact check and always run.
 */
export class ArtifactRegistry {
  private readonly paths = new Map<string, string>();

  constructor(entries: Record<string, string> = {}, baseDir?: string) {
    for (const [name, path] of Object.entries(entries)) {
      this.paths.set(
        name,
        baseDir && !isAbsolute(path) ? resolve(baseDir, path) : path
      );
    }
  }

  has(name: string): boolean {
    return this.paths.has(name);
  }

  path(name: string): string | undefined {
    return this.paths.get(name);
  }

  /**
   * Modification time in milliseconds, or undefined when the target has no
   * artifact or the artifact does not exist.
   */
  async timestamp(name: string): Promise<number | undefined> {
    const path = this.paths.get(name);
    if (path === undefined) {
      return undefined;
    }

    try {
      return (await stat(path)).mtimeMs;
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }
  }

  entries(): [string, string][] {
    return Array.from(this.paths.entries());
  }
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
