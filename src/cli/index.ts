#!/usr/bin/env node
import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };
export { version };

type CommandModule = { default: (args: string[]) => Promise<void> };

// Loaded lazily so `--help` does not pull in the whole pipeline
const COMMANDS = {
  fetch: (): Promise<CommandModule> => import("./commands/fetch.js"),
  list: (): Promise<CommandModule> => import("./commands/list.js"),
  init: (): Promise<CommandModule> => import("./commands/init.js"),
};
type Command = keyof typeof COMMANDS;

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(`gitsnip - cache single files from git repositories

Usage: gitsnip <command> [options]

Commands:
  fetch       Fetch a file at a branch, tag or commit into the snippet store
  list        Show cached snippets
  init        Write a starter gitsnip.toml

Fetch options:
  --git <url>            Repository URL (required)
  --branch <name>        Use this branch
  --tag <name>           Use this tag
  --commit-hash <sha>    Use this exact commit
  --path <file>          File path inside the repository (required)
  --dir <dir>            Snippet store directory (default: .snippets)
  --quiet, -q            Only print the snippet path
  --json                 Print the result as JSON

Options:
  --help, -h  Show this help message
  --version   Show version

Running gitsnip with options and no command runs fetch.`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const first = args[0];

  if (!first || first === "--help" || first === "-h") {
    printUsage();
    return;
  }
  if (first === "--version" || first === "-V") {
    // eslint-disable-next-line no-console
    console.log(version);
    return;
  }

  // `gitsnip --git ... --path ...` is shorthand for fetch
  const implicitFetch = first.startsWith("-");
  const command = implicitFetch ? "fetch" : first;

  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exitCode = 1;
    return;
  }

  const mod = await COMMANDS[command]();
  await mod.default(implicitFetch ? args : args.slice(1));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
