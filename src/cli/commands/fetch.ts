import { join, relative, resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { loadConfig, ConfigError } from "../../config/loader.js";
import { CONFIG_FILE } from "../../config/schema.js";
import { SnippetError } from "../../errors.js";
import type { ProgressEvent, ProgressListener } from "../../progress.js";
import { createGitRemote } from "../../remote/git.js";
import type { RemoteAccess } from "../../remote/git.js";
import { fetchSnippet } from "../../snippets/fetch.js";
import type { FetchSnippetResult } from "../../snippets/fetch.js";
import { requestFromFlags } from "../../snippets/request.js";
import { SnippetStore } from "../../store/store.js";

export interface FetchOptions {
  /** Directory holding gitsnip.toml; relative store paths resolve against it */
  cwd: string;
  git?: string;
  branch?: string;
  tag?: string;
  commitHash?: string;
  path?: string;
  dir?: string;
  remote?: RemoteAccess;
  onProgress?: ProgressListener;
}

export async function runFetch(opts: FetchOptions): Promise<FetchSnippetResult> {
  // Selector conflicts are reported before config or network are touched
  const request = requestFromFlags(opts);
  const config = await loadConfig(join(opts.cwd, CONFIG_FILE), opts.dir ? { dir: opts.dir } : {});

  const store = new SnippetStore(config.storeDir, { extension: config.extension });
  const remote = opts.remote ?? createGitRemote({ timeoutMs: config.git_timeout_ms });

  return fetchSnippet(request, {
    store,
    remote,
    keepWorkspace: config.keep_workspace,
    onProgress: opts.onProgress,
  });
}

/**
 * One line per progress event; null for events that print nothing.
 */
export function formatProgress(event: ProgressEvent): string | null {
  switch (event.type) {
    case "resolving":
      return chalk.bold(`Resolving ${event.selector} of ${event.url}`);
    case "default-branch":
      return chalk.dim(`  default branch: ${event.branch}`);
    case "resolved":
      return chalk.green(`  commit ${event.resolved.commit}`);
    case "key":
      return chalk.dim(
        `  key: url ${event.key.urlHash}, selector ${event.key.selectorHash}, path ${event.key.pathHash}`,
      );
    case "cache-hit":
      return null;
    case "cache-stale":
      return chalk.yellow(`  cached snippet is stale (${event.current.slice(0, 8)} → ${event.next.slice(0, 8)})`);
    case "cache-miss":
      return chalk.dim("  not cached yet");
    case "fetching":
      return chalk.dim(`  fetching ${event.commit.slice(0, 8)} into ${event.workspace}`);
    case "fetched":
      return chalk.dim(`  read ${event.path} (${event.bytes} bytes)`);
    case "saved":
      return null;
    case "workspace-kept":
      return chalk.dim(`  workspace kept at ${event.workspace}`);
  }
}

function display(path: string, cwd: string): string {
  const rel = relative(cwd, path);
  return rel.startsWith("..") ? path : rel;
}

export default async function fetch(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      git: { type: "string" },
      branch: { type: "string" },
      tag: { type: "string" },
      "commit-hash": { type: "string" },
      path: { type: "string" },
      dir: { type: "string" },
      quiet: { type: "boolean", short: "q" },
      json: { type: "boolean" },
    },
    strict: true,
  });

  if (!values.git || !values.path) {
    console.error(
      chalk.red("Usage: gitsnip fetch --git <url> [--branch <name> | --tag <name> | --commit-hash <sha>] --path <file>"),
    );
    process.exitCode = 1;
    return;
  }

  const cwd = resolve(".");
  const verbose = !values.quiet && !values.json;

  try {
    const result = await runFetch({
      cwd,
      git: values.git,
      branch: values.branch,
      tag: values.tag,
      commitHash: values["commit-hash"],
      path: values.path,
      dir: values.dir,
      onProgress: verbose
        ? (event) => {
            const line = formatProgress(event);
            if (line) console.log(line);
          }
        : undefined,
    });

    if (values.json) {
      console.log(
        JSON.stringify(
          {
            status: result.status,
            path: result.record.path,
            commit: result.record.commit,
            prefix: result.key.prefix,
            ...(result.previousCommit ? { previous_commit: result.previousCommit } : {}),
          },
          null,
          2,
        ),
      );
      return;
    }

    const shown = display(result.record.path, cwd);
    if (values.quiet) {
      console.log(shown);
    } else if (result.status === "up-to-date") {
      console.log(chalk.green(`Snippet is up to date: ${shown}`));
    } else if (result.status === "updated") {
      console.log(chalk.green(`Updated snippet: ${shown}`));
    } else {
      console.log(chalk.green(`Saved snippet: ${shown}`));
    }
  } catch (err) {
    if (err instanceof SnippetError) {
      console.error(chalk.red(`${err.stage} failed: ${err.message}`));
      process.exitCode = 1;
      return;
    }
    if (err instanceof ConfigError) {
      console.error(chalk.red(err.message));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
