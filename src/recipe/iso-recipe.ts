import { join, resolve } from "node:path";
import { ArtifactRegistry } from "../core/artifacts";
import type { Action, ExecAction, Recipe, Target } from "../types";
import { type RecipeConfig, templateVariables } from "./config";

export const DEFAULT_TARGET = "iso";

/**
 * Paths and names every target of the recipe is derived from. Relative
 * paths in the configuration are resolved against the working directory.
 */
export type RecipeLayout = {
  workDir: string;
  baseIsoName: string;
  baseIsoUrl: string;
  baseIso: string;
  mfsbsdArchive: string;
  mfsbsdArchiveUrl: string;
  mfsbsdTree: string;
  mfsbsdStamp: string;
  device: string;
  mountPoint: string;
  packagesDir: string;
  packagesStamp: string;
  outputIso: string;
};

export function resolveLayout(config: RecipeConfig, workDir: string): RecipeLayout {
  const { arch, mirror, patch, release } = config.freebsd;
  // "11.0-RELEASE" is published under ISO-IMAGES/11.0
  const [version = release] = release.split("-");
  const baseIsoName = `FreeBSD-${release}-${arch}-disc1.iso`;
  const mfsbsdVersion = config.mfsbsd.version;
  const mfsbsdTree = resolve(workDir, `mfsbsd-${mfsbsdVersion}`);
  const outputIso =
    config.build.outputIso ?? `mfsbsd-${release}${patch ? `-${patch}` : ""}-${arch}.iso`;

  return {
    baseIso: resolve(workDir, baseIsoName),
    baseIsoName,
    baseIsoUrl: `${mirror.replace(/\/+$/, "")}/${arch}/${arch}/ISO-IMAGES/${version}/${baseIsoName}`,
    device: config.memoryDisk.device ?? `/dev/md${config.memoryDisk.unit}`,
    mfsbsdArchive: resolve(workDir, `${mfsbsdVersion}.tar.gz`),
    mfsbsdArchiveUrl:
      config.mfsbsd.archiveUrl ??
      `https://github.com/mmatuska/mfsbsd/archive/${mfsbsdVersion}.tar.gz`,
    mfsbsdStamp: join(mfsbsdTree, ".fetched"),
    mfsbsdTree,
    mountPoint: config.memoryDisk.mountPoint,
    outputIso: join(mfsbsdTree, outputIso),
    packagesDir: resolve(workDir, config.packagesDir),
    packagesStamp: resolve(workDir, config.packagesDir, ".fetched"),
    workDir,
  };
}

function exec(argv: ExecAction["argv"], options: Omit<ExecAction, "argv" | "kind"> = {}): ExecAction {
  return { argv, kind: "exec", ...options };
}

/**
 * The FreeBSD ISO build: fetch the base release ISO and mfsBSD, mount the
 * ISO on a memory disk, stage rc.conf, custom files and packages into the
 * mfsBSD tree, then let mfsBSD's `make iso` produce the image.
 */
export function createIsoRecipe(config: RecipeConfig, workDir: string): Recipe {
  const layout = resolveLayout(config, workDir);
  const { mfsbsdTree } = layout;
  const wget = config.tools.wget;

  const variables = templateVariables(config);
  const customFiles = join(mfsbsdTree, "customfiles");
  const renderCustomFiles: Action[] =
    Object.keys(variables).length > 0 ? [{ dir: customFiles, kind: "render", variables }] : [];

  const fetchPackages: Action[] = config.packages.map((name) =>
    exec(["pkg", "fetch", "--yes", "--dependencies", "--output", layout.packagesDir, name])
  );

  const targets: Target[] = [
    {
      actions: [
        exec(
          [
            "make",
            "iso",
            `BASE=${join(layout.mountPoint, "usr/freebsd-dist")}/`,
            `PKG_STATIC=${config.build.pkgStatic}`,
            `MFSROOT_MAXSIZE=${config.build.mfsrootMaxSize}`,
          ],
          { cwd: mfsbsdTree }
        ),
      ],
      description: "Build the mfsBSD ISO image",
      name: DEFAULT_TARGET,
      prerequisites: ["memory-disk", "rc-conf", "packages", "customfiles"],
    },
    {
      actions: [exec(["pkg", "install", "-y", "wget"])],
      description: "Install wget",
      name: "wget",
      prerequisites: [],
    },
    {
      actions: [
        exec([wget, "-O", layout.mfsbsdArchive, layout.mfsbsdArchiveUrl]),
        exec(["tar", "-xzf", layout.mfsbsdArchive, "-C", layout.workDir]),
        { kind: "remove", path: layout.mfsbsdArchive },
        // tar restores archived mtimes, so the tree itself cannot date the fetch
        { kind: "stamp", path: layout.mfsbsdStamp },
      ],
      description: `Download and unpack mfsBSD ${config.mfsbsd.version}`,
      name: "mfsbsd",
      prerequisites: ["wget"],
    },
    {
      actions: [exec([wget, "-O", layout.baseIso, layout.baseIsoUrl])],
      description: `Download ${layout.baseIsoName}`,
      name: "base-iso",
      prerequisites: ["wget"],
    },
    {
      actions: [
        exec(
          ["mdconfig", "-a", "-t", "vnode", "-u", String(config.memoryDisk.unit), "-f", layout.baseIso],
          { tolerateFailure: "skip-rest" }
        ),
        { kind: "mkdir", path: layout.mountPoint, tolerateFailure: "skip-rest" },
        exec(["mount_cd9660", layout.device, layout.mountPoint], { tolerateFailure: true }),
      ],
      description: `Attach the base ISO as ${layout.device} and mount it on ${layout.mountPoint}`,
      name: "memory-disk",
      prerequisites: ["base-iso"],
    },
    {
      actions: [],
      description: "Site rc.conf (source file)",
      name: "site-rc-conf",
      prerequisites: [],
    },
    {
      actions: [
        { from: resolve(workDir, config.rcConf), kind: "copy", to: join(mfsbsdTree, "conf", "rc.conf") },
      ],
      description: "Stage rc.conf into the mfsBSD tree",
      name: "rc-conf",
      prerequisites: ["mfsbsd", "site-rc-conf"],
    },
    {
      actions: [
        // pkg fetch only creates All when it has something to fetch
        { kind: "mkdir", path: join(layout.packagesDir, "All") },
        ...fetchPackages,
        { from: join(layout.packagesDir, "All"), kind: "copy", to: join(mfsbsdTree, "packages") },
        // Cached packages are not rewritten, so All cannot date the fetch
        { kind: "stamp", path: layout.packagesStamp },
      ],
      description: `Prefetch packages: ${config.packages.join(", ") || "(none)"}`,
      name: "packages",
      prerequisites: ["mfsbsd"],
    },
    {
      actions: [
        { kind: "remove", path: customFiles },
        { from: resolve(workDir, config.customFiles), kind: "copy", to: customFiles },
        ...renderCustomFiles,
      ],
      description: "Mirror custom files into the mfsBSD tree (always runs)",
      name: "customfiles",
      prerequisites: ["mfsbsd"],
    },
    {
      actions: [
        exec(["make", "clean"], { cwd: mfsbsdTree, tolerateFailure: true }),
        { kind: "remove", path: layout.outputIso },
      ],
      description: "Remove the built ISO and reset mfsBSD's build state",
      name: "clean",
      prerequisites: [],
    },
    {
      actions: [
        exec(["pkg", "install", "-y", config.templating.runtimePackage]),
        exec([config.templating.python, "-m", "ensurepip"]),
        ...config.templating.pipPackages.map((name) => exec(["pip3", "install", name])),
      ],
      description: "Install the Python templating tools",
      name: "install",
      prerequisites: [],
    },
  ];

  const artifacts = new ArtifactRegistry(
    {
      "base-iso": layout.baseIso,
      [DEFAULT_TARGET]: layout.outputIso,
      "memory-disk": layout.device,
      mfsbsd: layout.mfsbsdStamp,
      packages: layout.packagesStamp,
      "rc-conf": join(mfsbsdTree, "conf", "rc.conf"),
      "site-rc-conf": config.rcConf,
      wget,
    },
    workDir
  );

  return { artifacts, defaultTarget: DEFAULT_TARGET, targets };
}
