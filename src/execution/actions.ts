import { cp, mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Action, FileAction } from "../types";
import { hasPlaceholders, renderTemplate } from "../utils/template";

const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

function quote(arg: string): string {
  if (SAFE_ARGUMENT.test(arg)) {
    return arg;
  }
  return `'${arg.replaceAll("'", `'\\''`)}'`;
}

/**
 * Render an action as the shell command line it is equivalent to.
 */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case "exec": {
      const command = action.argv.map(quote).join(" ");
      return action.cwd ? `cd ${quote(action.cwd)} && ${command}` : command;
    }
    case "mkdir":
      return `mkdir -p ${quote(action.path)}`;
    case "copy":
      return `cp -R ${quote(action.from)} ${quote(action.to)}`;
    case "remove":
      return `rm -rf ${quote(action.path)}`;
    case "stamp":
      return `touch ${quote(action.path)}`;
    case "render":
      return `render ${quote(action.dir)} with ${Object.keys(action.variables).sort().join(", ") || "no variables"}`;
  }
}

export async function runFileAction(action: FileAction): Promise<void> {
  switch (action.kind) {
    case "mkdir":
      await mkdir(action.path, { recursive: true });
      return;
    case "copy":
      // Merges into an existing destination directory
      await cp(action.from, action.to, { force: true, recursive: true });
      return;
    case "remove":
      await rm(action.path, { force: true, recursive: true });
      return;
    case "stamp":
      // mtime comes from the filesystem clock, like every file later steps write
      await writeFile(action.path, "");
      return;
    case "render":
      for (const file of await listFiles(action.dir)) {
        const text = await readFile(file, "utf-8");
        // Files without placeholders are left byte for byte
        if (hasPlaceholders(text)) {
          await writeFile(file, renderTemplate(text, action.variables));
        }
      }
      return;
  }
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path)));
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
  return files;
}
