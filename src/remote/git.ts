import { exec, ExecError } from "../utils/exec.js";

export class GitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GitError";
  }
}

export interface RemoteRef {
  /** Full ref name as advertised, e.g. "refs/tags/v1^{}" */
  name: string;
  commit: string;
}

/**
 * What the resolver and materializer need from a git remote.
 * Every call either completes or rejects with a {@link GitError}.
 */
export interface RemoteAccess {
  /** Default branch advertised through the remote's HEAD symref, e.g. "refs/heads/main". */
  defaultBranch(url: string): Promise<string>;
  /** Advertised refs whose names exactly match one of `refNames`. No objects are transferred. */
  listRefs(url: string, refNames: string[]): Promise<RemoteRef[]>;
  /** Create an empty repository in `dir`. */
  init(dir: string): Promise<void>;
  /** Fetch exactly one commit, depth 1, into the repository at `dir`. */
  fetchCommit(dir: string, url: string, commit: string): Promise<void>;
  /** Check out `commit`'s tree into the working directory, detached. */
  checkout(dir: string, commit: string): Promise<void>;
}

/**
 * Turn a failed git invocation into a GitError, with a hint when a private
 * GitHub repo was addressed over HTTPS.
 */
function toGitError(action: string, url: string, err: unknown): unknown {
  if (!(err instanceof ExecError)) return err;

  const stderr = err.stderr;
  if (
    url.startsWith("https://github.com/") &&
    (/terminal prompts disabled/i.test(stderr) || /could not read Username/i.test(stderr))
  ) {
    // https://github.com/org/repo[.git][/] -> git@github.com:org/repo.git
    let path = url.slice("https://github.com/".length);
    while (path.endsWith("/")) path = path.slice(0, -1);
    const sshUrl = "git@github.com:" + (path.endsWith(".git") ? path : path + ".git");
    return new GitError(
      `Failed to ${action} ${url}: authentication required.\n` +
        `Hint: for private repos, use the SSH URL instead:\n` +
        `  gitsnip fetch --git ${sshUrl} ...`,
      { cause: err },
    );
  }
  return new GitError(`Failed to ${action} ${url}: ${stderr.trim() || err.message}`, { cause: err });
}

/**
 * Parse `git ls-remote` output ("<sha>\t<ref>" per line).
 */
export function parseLsRemote(stdout: string): RemoteRef[] {
  const refs: RemoteRef[] = [];
  for (const line of stdout.split("\n")) {
    const match = line.match(/^([0-9a-f]{40}|[0-9a-f]{64})\t(.+)$/);
    if (match?.[1] && match[2]) {
      refs.push({ commit: match[1], name: match[2] });
    }
  }
  return refs;
}

/**
 * Extract the HEAD symref target from `git ls-remote --symref <url> HEAD`.
 */
export function parseSymref(stdout: string): string | undefined {
  for (const line of stdout.split("\n")) {
    const match = line.match(/^ref: (\S+)\tHEAD$/);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

export interface GitRemoteOptions {
  /** Per-command timeout in milliseconds (0 = none). */
  timeoutMs?: number;
}

/**
 * {@link RemoteAccess} backed by the git CLI.
 */
export function createGitRemote(opts: GitRemoteOptions = {}): RemoteAccess {
  const timeoutMs = opts.timeoutMs ?? 0;

  return {
    async defaultBranch(url) {
      let stdout: string;
      try {
        ({ stdout } = await exec("git", ["ls-remote", "--symref", "--", url, "HEAD"], { timeoutMs }));
      } catch (err) {
        throw toGitError("list references of", url, err);
      }
      const target = parseSymref(stdout);
      if (!target) {
        throw new GitError(`Remote ${url} does not advertise a default branch`);
      }
      return target;
    },

    async listRefs(url, refNames) {
      let stdout: string;
      try {
        ({ stdout } = await exec("git", ["ls-remote", "--", url, ...refNames], { timeoutMs }));
      } catch (err) {
        throw toGitError("list references of", url, err);
      }
      // ls-remote patterns match on the tail, so keep exact names only
      const wanted = new Set(refNames);
      return parseLsRemote(stdout).filter((ref) => wanted.has(ref.name));
    },

    async init(dir) {
      try {
        await exec("git", ["init", "--quiet", "--", dir], { timeoutMs });
      } catch (err) {
        throw toGitError("initialize repository in", dir, err);
      }
    },

    async fetchCommit(dir, url, commit) {
      try {
        await exec(
          "git",
          ["fetch", "--quiet", "--depth=1", "--no-tags", "--", url, `+${commit}:refs/gitsnip/fetched`],
          { cwd: dir, timeoutMs },
        );
      } catch (err) {
        throw toGitError(`fetch commit ${commit} from`, url, err);
      }
    },

    async checkout(dir, commit) {
      try {
        await exec("git", ["-c", "advice.detachedHead=false", "checkout", "--quiet", "--detach", commit], {
          cwd: dir,
          timeoutMs,
        });
      } catch (err) {
        throw toGitError(`check out ${commit} in`, dir, err);
      }
    },
  };
}

/** Default remote, used when callers do not supply their own. */
export const gitRemote: RemoteAccess = createGitRemote();
