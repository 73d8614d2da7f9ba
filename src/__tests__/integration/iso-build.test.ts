import ansis from "ansis";
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  utimesSync,
  writeFileSync,
} from "node:fs";
import os from "node:os";
import { dirname, join } from "node:path";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";
import { GraphBuilder } from "../../core/graph-builder";
import { Runner, loadIsoRecipe } from "../../execution/runner";
import type { ExecAction } from "../../types";
import { FakeCommandRunner } from "../helpers/fake-command-runner";

const ISO_NAME = "mfsbsd-11.0-RELEASE-p1-amd64.iso";

function writeFile(path: string, content = ""): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

function argAfter(action: ExecAction, flag: string): string {
  const value = action.argv[action.argv.indexOf(flag) + 1];
  if (value === undefined) {
    throw new Error(`${flag} has no value in ${action.argv.join(" ")}`);
  }
  return value;
}

describe("ISO build", () => {
  let tmpDir: string;
  let commandRunner: FakeCommandRunner;
  let runner: Runner;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;

  const paths = () => ({
    baseIso: join(tmpDir, "FreeBSD-11.0-RELEASE-amd64-disc1.iso"),
    device: join(tmpDir, "dev", "md10"),
    iso: join(tmpDir, "mfsbsd-2.3", ISO_NAME),
    mountPoint: join(tmpDir, "cdrom"),
    tree: join(tmpDir, "mfsbsd-2.3"),
    wget: join(tmpDir, "bin", "wget"),
  });

  const build = (...args: string[]) =>
    runner.run(["-q", ...args], { cwd: tmpDir });

  const writeConfig = (settings: Record<string, unknown> = {}) => {
    const { device, mountPoint, wget } = paths();
    writeFile(
      join(tmpDir, "bsdiso.config.json"),
      JSON.stringify({ memoryDisk: { device, mountPoint }, tools: { wget }, ...settings })
    );
  };

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "bsdiso-iso-"));
    const { device, wget } = paths();

    writeConfig();
    writeFile(join(tmpDir, "rc.conf"), 'sshd_enable="YES"\n');
    writeFile(join(tmpDir, "customfiles", "etc", "motd"), "welcome\n");

    commandRunner = new FakeCommandRunner()
      .on("pkg", (action) => {
        if (action.argv[1] === "install") {
          writeFile(wget, "#!/bin/sh\n");
        } else if (action.argv[1] === "fetch") {
          // Like pkg, leaves packages that are already cached alone
          const name = action.argv[action.argv.length - 1];
          const file = join(argAfter(action, "--output"), "All", `${name}.pkg`);
          if (!existsSync(file)) {
            writeFile(file);
          }
        }
        return 0;
      })
      .on("wget", (action) => {
        writeFile(argAfter(action, "-O"), "downloaded");
        return 0;
      })
      .on("tar", (action) => {
        const tree = join(argAfter(action, "-C"), "mfsbsd-2.3");
        writeFile(join(tree, "Makefile"), "iso:\n");
        mkdirSync(join(tree, "conf"), { recursive: true });
        mkdirSync(join(tree, "packages"), { recursive: true });
        return 0;
      })
      .on("mdconfig", () => {
        writeFile(device);
        return 0;
      })
      .on("make", (action) => {
        if (action.argv[1] === "iso" && action.cwd) {
          writeFile(join(action.cwd, ISO_NAME), "iso image");
        }
        return 0;
      });
    runner = new Runner(commandRunner);

    vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    rmSync(tmpDir, { force: true, recursive: true });
    vi.restoreAllMocks();
  });

  it("builds everything once from an empty directory", async () => {
    const { device, iso, tree } = paths();

    expect(await build()).toBe(0);

    expect(commandRunner.summary()).toEqual([
      "pkg install",
      "wget -O",
      "mdconfig -a",
      `mount_cd9660 ${device}`,
      "wget -O",
      "tar -xzf",
      "pkg fetch",
      "pkg fetch",
      "make iso",
    ]);
    expect(existsSync(iso)).toBe(true);
    expect(existsSync(join(tree, "conf", "rc.conf"))).toBe(true);
    expect(existsSync(join(tree, "packages", "nginx.pkg"))).toBe(true);
    expect(existsSync(join(tree, "customfiles", "etc", "motd"))).toBe(true);
    expect(existsSync(join(tmpDir, "2.3.tar.gz"))).toBe(false);
  });

  it("starts no command on a second run", async () => {
    expect(await build()).toBe(0);
    commandRunner.reset();

    expect(await build()).toBe(0);

    expect(commandRunner.calls).toEqual([]);
  });

  it("rebuilds only the image after it is deleted", async () => {
    const { iso, tree } = paths();
    expect(await build()).toBe(0);
    commandRunner.reset();
    rmSync(iso);

    expect(await build()).toBe(0);

    expect(commandRunner.summary()).toEqual(["make iso"]);
    expect(commandRunner.calls[0]?.cwd).toBe(tree);
    expect(existsSync(iso)).toBe(true);
  });

  it("stops at a failing package fetch and returns its exit code", async () => {
    commandRunner.on("pkg", (action) => {
      if (action.argv[1] === "install") {
        writeFile(paths().wget);
        return 0;
      }
      return 3;
    });

    expect(await build()).toBe(3);

    expect(commandRunner.summary()).not.toContain("make iso");
    expect(commandRunner.summary().at(-1)).toBe("pkg fetch");
    expect(existsSync(paths().iso)).toBe(false);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error:",
      `Target 'packages' failed: 'pkg fetch --yes --dependencies --output ${join(tmpDir, "packages")} node' exited with code 3`
    );
  });

  it("skips the mount when the memory disk cannot be attached", async () => {
    const { device, iso } = paths();
    expect(await build()).toBe(0);
    commandRunner.reset();

    const old = new Date("2016-09-01T00:00:00Z");
    utimesSync(device, old, old);
    commandRunner.on("mdconfig", () => 1);
    commandRunner.on("mount_cd9660", () => 1);

    expect(await build()).toBe(0);

    expect(commandRunner.summary()).toEqual(["mdconfig -a", "make iso"]);
    expect(existsSync(iso)).toBe(true);
    const warnings = consoleWarnSpy.mock.calls.map(([message]) =>
      ansis.strip(String(message))
    );
    expect(warnings).toEqual([
      `⚠ [memory-disk] 'mdconfig -a -t vnode -u 10 -f ${paths().baseIso}' exited with code 1, skipping the rest of memory-disk`,
    ]);
  });

  it("keeps building when the mount fails after attaching", async () => {
    const { device, iso } = paths();
    commandRunner.on("mount_cd9660", () => 1);

    expect(await build()).toBe(0);

    expect(commandRunner.summary()).toContain(`mount_cd9660 ${device}`);
    expect(existsSync(iso)).toBe(true);
    expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
  });

  it("settles after mfsBSD is fetched again over a cached package directory", async () => {
    const { tree } = paths();
    expect(await build()).toBe(0);
    const old = new Date("2020-01-01T00:00:00Z");
    utimesSync(join(tmpDir, "packages", "All"), old, old);
    rmSync(tree, { force: true, recursive: true });

    expect(await build()).toBe(0);
    commandRunner.reset();

    expect(await build()).toBe(0);
    expect(commandRunner.calls).toEqual([]);
  });

  it("builds with an empty package list", async () => {
    const { iso, tree } = paths();
    writeConfig({ packages: [] });

    expect(await build()).toBe(0);

    expect(commandRunner.summary()).not.toContain("pkg fetch");
    expect(existsSync(join(tree, "packages"))).toBe(true);
    expect(existsSync(iso)).toBe(true);
  });

  it("renders custom files with the selected flavor", async () => {
    const { tree } = paths();
    writeConfig({
      appName: "shop",
      flavor: "production",
      flavors: { production: { port: 443 }, staging: { port: 8080 } },
    });
    writeFile(
      join(tmpDir, "customfiles", "etc", "motd"),
      "Welcome to {{ app_name }} ({{flavor_name}}) on port {{ port }}\n"
    );

    expect(await build("--flavor=staging")).toBe(0);

    expect(readFileSync(join(tree, "customfiles", "etc", "motd"), "utf-8")).toBe(
      "Welcome to shop (staging) on port 8080\n"
    );
    expect(readFileSync(join(tmpDir, "customfiles", "etc", "motd"), "utf-8")).toBe(
      "Welcome to {{ app_name }} ({{flavor_name}}) on port {{ port }}\n"
    );
  });

  it("rejects an unknown flavor before running anything", async () => {
    writeConfig({ flavors: { staging: { port: 8080 } } });

    expect(await build("--flavor=qa")).toBe(1);

    expect(commandRunner.calls).toEqual([]);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error:",
      "Flavor with name 'qa' not found. Choices are: staging"
    );
  });

  it("visits every target at most once", async () => {
    const recipe = loadIsoRecipe(tmpDir, {});
    const graph = new GraphBuilder().buildGraph(recipe.targets);

    for (const name of graph.names()) {
      const order = graph.executionOrder([name]);
      expect(new Set(order).size).toBe(order.length);
      expect(order.at(-1)).toBe(name);
    }

    expect(await build("iso", "mfsbsd", "base-iso")).toBe(0);
    const programs = commandRunner.summary();
    expect(programs.filter((p) => p === "pkg install")).toHaveLength(1);
    expect(programs.filter((p) => p === "tar -xzf")).toHaveLength(1);
  });

  it("clean removes the image even when everything is up to date", async () => {
    const { baseIso, iso, tree } = paths();
    expect(await build()).toBe(0);
    commandRunner.reset();

    expect(await build("clean")).toBe(0);

    expect(commandRunner.summary()).toEqual(["make clean"]);
    expect(commandRunner.calls[0]?.cwd).toBe(tree);
    expect(existsSync(iso)).toBe(false);
    expect(existsSync(baseIso)).toBe(true);
  });

  it("clean tolerates a missing mfsBSD tree", async () => {
    commandRunner.on("make", () => 2);

    expect(await build("clean")).toBe(0);

    expect(commandRunner.summary()).toEqual(["make clean"]);
    expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
  });

  it("dry run prints the plan without touching the disk", async () => {
    const { wget } = paths();

    expect(await build("-n")).toBe(0);

    expect(commandRunner.calls).toEqual([]);
    expect(existsSync(wget)).toBe(false);
    expect(existsSync(join(tmpDir, "packages"))).toBe(false);
  });
});
