import { join, resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { loadConfig, ConfigError } from "../../config/loader.js";
import { CONFIG_FILE } from "../../config/schema.js";
import { StorageError } from "../../errors.js";
import { SnippetStore } from "../../store/store.js";
import type { SnippetRecord } from "../../store/store.js";

export interface ListOptions {
  cwd: string;
  dir?: string;
}

export interface ListResult {
  storeDir: string;
  snippets: SnippetRecord[];
}

export async function runList(opts: ListOptions): Promise<ListResult> {
  const config = await loadConfig(join(opts.cwd, CONFIG_FILE), opts.dir ? { dir: opts.dir } : {});
  const store = new SnippetStore(config.storeDir, { extension: config.extension });
  return { storeDir: config.storeDir, snippets: await store.list() };
}

export default async function list(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      dir: { type: "string" },
      json: { type: "boolean" },
    },
    strict: true,
  });

  try {
    const { storeDir, snippets } = await runList({ cwd: resolve("."), dir: values.dir });

    if (values.json) {
      console.log(JSON.stringify(snippets, null, 2));
      return;
    }

    if (snippets.length === 0) {
      console.log(chalk.dim(`No snippets in ${storeDir}.`));
      return;
    }

    console.log(chalk.bold(`Snippets in ${storeDir}:`));
    for (const s of snippets) {
      console.log(`  ${s.prefix}  ${chalk.dim(s.commit.slice(0, 12))}`);
    }
  } catch (err) {
    if (err instanceof ConfigError || err instanceof StorageError) {
      console.error(chalk.red(err.message));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
