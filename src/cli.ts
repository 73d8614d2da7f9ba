#!/usr/bin/env node

import ansis from "ansis";
import { Runner } from "./execution/runner";

function showHelp(): void {
  console.log(`
${ansis.bold("bsdiso")} - build a customized FreeBSD mfsBSD ISO

${ansis.bold("Usage:")}
  bsdiso [targets] [flags]

${ansis.bold("Targets:")}
  iso                   Build the ISO (default)
  clean                 Remove the ISO and reset mfsBSD's build state
  packages              Prefetch packages into the packages cache
  customfiles           Mirror custom files into the mfsBSD tree
  'rc-*' '!site-*'      Glob patterns and '!' exclusions also work

${ansis.bold("Flags:")}
  -n, --dry-run         Print the actions that would run
  -B, --always-make     Remake every target regardless of timestamps
  -l, --list            List targets and exit
  -q, --quiet           Suppress output
  -h, --help            Show this help
  -C <dir>              Run in <dir> (also --directory=<dir>)
  --config=<file>       Read configuration from <file>
                        (default: bsdiso.config.json)
  --flavor=<name>       Render custom files with the settings of a flavor
  --no-prefix           Disable output prefixes
  --prefix=<str>        Custom prefix

${ansis.bold("Examples:")}
  bsdiso                      Build everything that is out of date
  bsdiso -n                   Show what would be done
  bsdiso clean iso            Rebuild the ISO from a clean tree
  bsdiso -C /usr/src/iso -q   Build quietly in another directory
  bsdiso --flavor=staging     Build with the staging flavor's settings
  `);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Show help
  if (args.includes("--help") || args.includes("-h")) {
    showHelp();
    process.exit(0);
  }

  const runner = new Runner();
  process.exit(await runner.run(args));
}

main().catch((error) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
