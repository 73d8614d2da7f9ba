import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors";

export const CONFIG_FILE_NAME = "bsdiso.config.json";

const RecipeConfigSchema = z.object({
  freebsd: z
    .object({
      release: z.string().regex(/^\d+\.\d+-[A-Z0-9]+$/).default("11.0-RELEASE"),
      arch: z.string().min(1).default("amd64"),
      patch: z.string().default("p1"),
      mirror: z.string().url().default("https://download.freebsd.org/ftp/releases"),
    })
    .default({}),
  mfsbsd: z
    .object({
      version: z.string().min(1).default("2.3"),
      archiveUrl: z.string().url().optional(),
    })
    .default({}),
  memoryDisk: z
    .object({
      unit: z.number().int().nonnegative().default(10),
      device: z.string().optional(),
      mountPoint: z.string().min(1).default("/tmp/cdrom"),
    })
    .default({}),
  build: z
    .object({
      pkgStatic: z.string().min(1).default("/usr/local/sbin/pkg-static"),
      mfsrootMaxSize: z.string().regex(/^\d+[kmg]?$/).default("250m"),
      outputIso: z.string().optional(),
    })
    .default({}),
  tools: z
    .object({
      wget: z.string().min(1).default("/usr/local/bin/wget"),
    })
    .default({}),
  packages: z.array(z.string().min(1)).default(["node", "nginx"]),
  packagesFile: z.string().optional(),
  packagesDir: z.string().min(1).default("packages"),
  rcConf: z.string().min(1).default("rc.conf"),
  customFiles: z.string().min(1).default("customfiles"),
  appName: z.string().min(1).optional(),
  flavor: z.string().min(1).optional(),
  flavors: z
    .record(z.string(), z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])))
    .default({}),
  templating: z
    .object({
      runtimePackage: z.string().min(1).default("python36"),
      python: z.string().min(1).default("python3.6"),
      pipPackages: z.array(z.string().min(1)).default(["pyyaml", "jinja2"]),
    })
    .default({}),
});

export type RecipeConfigInput = z.input<typeof RecipeConfigSchema>;

export type RecipeConfig = z.output<typeof RecipeConfigSchema>;

/**
 * Validate raw configuration and fill in defaults.
 */
export function parseRecipeConfig(raw: unknown, source = "configuration"): RecipeConfig {
  const result = RecipeConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return `${path || "root"}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${source}:\n  ${problems.join("\n  ")}`);
  }
  return result.data;
}

/**
 * Load the recipe configuration from `configFile` (relative to `cwd`), or
 * from bsdiso.config.json in `cwd` when present. Without either, defaults
 * apply. The packages file, when configured, is read here as well.
 */
export function loadRecipeConfig(cwd: string, configFile?: string): RecipeConfig {
  const path = configFile ? resolve(cwd, configFile) : join(cwd, CONFIG_FILE_NAME);

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Error reading ${path}: ${message}`);
    }
  } else if (configFile) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  const config = parseRecipeConfig(raw, path);
  if (config.packagesFile) {
    config.packages = mergePackages(
      config.packages,
      readPackagesFile(resolve(cwd, config.packagesFile))
    );
  }
  return config;
}

/**
 * One package per line; blank lines and `#` comments are ignored.
 */
export function parsePackageList(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.replace(/#.*$/, "").trim())
    .filter((line) => line.length > 0);
}

function readPackagesFile(path: string): string[] {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Packages file not found: ${path}. Check the packagesFile setting.`
    );
  }
  return parsePackageList(readFileSync(path, "utf-8"));
}

/**
 * Values for the `{{ name }}` placeholders in custom files: the selected
 * flavor's settings plus `app_name` and `flavor_name`. Empty when neither an
 * app name nor a flavor is configured.
 */
export function templateVariables(config: RecipeConfig): Record<string, string> {
  const variables: Record<string, string> = {};

  if (config.flavor !== undefined) {
    const settings = config.flavors[config.flavor];
    if (!settings) {
      const choices = Object.keys(config.flavors).join(", ") || "(none)";
      throw new ConfigError(
        `Flavor with name '${config.flavor}' not found. Choices are: ${choices}`
      );
    }
    for (const [name, value] of Object.entries(settings)) {
      variables[name] = String(value);
    }
    variables.flavor_name = config.flavor;
  }
  if (config.appName !== undefined) {
    variables.app_name = config.appName;
  }
  return variables;
}

export function mergePackages(...lists: string[][]): string[] {
  return [...new Set(lists.flat())];
}
