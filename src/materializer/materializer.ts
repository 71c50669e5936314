import { readFile, realpath } from "node:fs/promises";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { FetchError, FileNotFoundError, StorageError } from "../errors.js";
import type { RemoteAccess } from "../remote/git.js";
import { acquireWorkspace } from "./workspace.js";
import type { Workspace } from "./workspace.js";

export interface Checkout {
  workspace: Workspace;
  commit: string;
}

/**
 * Fetch one commit (depth 1, by id rather than by branch) into a fresh
 * workspace and check out its tree.
 *
 * On failure the workspace is released before the error propagates. On
 * success the caller owns it and must release it.
 */
export async function materialize(
  remote: RemoteAccess,
  repoUrl: string,
  commit: string,
  onWorkspace?: (dir: string) => void,
): Promise<Checkout> {
  let workspace: Workspace;
  try {
    workspace = await acquireWorkspace();
  } catch (err) {
    throw new FetchError(commit, `Could not create a fetch workspace: ${messageOf(err)}`, { cause: err });
  }
  onWorkspace?.(workspace.dir);

  try {
    await remote.init(workspace.dir);
    await remote.fetchCommit(workspace.dir, repoUrl, commit);
    await remote.checkout(workspace.dir, commit);
  } catch (err) {
    await workspace.release();
    throw new FetchError(commit, `Could not fetch commit ${commit}: ${messageOf(err)}`, { cause: err });
  }

  return { workspace, commit };
}

const MISSING_CODES = new Set(["ENOENT", "EISDIR", "ENOTDIR", "ENAMETOOLONG", "ELOOP"]);

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function isOutside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === "" || rel.startsWith("..") || isAbsolute(rel) || rel === ".git" || rel.startsWith(`.git${sep}`);
}

/**
 * Read a file out of a checkout as raw bytes.
 *
 * Symlinks are followed only while they stay inside the checkout, so the
 * bytes always come from the fetched commit.
 */
export async function readCheckoutFile(checkout: Checkout, relativePath: string): Promise<Buffer> {
  const root = checkout.workspace.dir;
  const target = resolve(root, relativePath);
  // Never read outside the checkout or from git's own metadata
  if (isOutside(root, target)) {
    throw new FileNotFoundError(relativePath, checkout.commit);
  }

  try {
    const realRoot = await realpath(root);
    const realTarget = await realpath(target);
    if (isOutside(realRoot, realTarget)) {
      throw new FileNotFoundError(relativePath, checkout.commit);
    }
    return await readFile(realTarget);
  } catch (err) {
    if (err instanceof FileNotFoundError) throw err;
    const code = errorCode(err);
    if (code && MISSING_CODES.has(code)) {
      throw new FileNotFoundError(relativePath, checkout.commit);
    }
    throw new StorageError(`Could not read "${relativePath}" from the checkout: ${messageOf(err)}`, {
      cause: err,
    });
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
