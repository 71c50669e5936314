import { ResolutionError } from "../errors.js";
import type { RemoteAccess } from "../remote/git.js";
import { describeSelector } from "../selector.js";
import type { Selector, SelectorKind } from "../selector.js";
import type { ProgressListener } from "../progress.js";

const COMMIT_ID = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/i;

export interface ResolvedReference {
  /** Full-length commit id */
  commit: string;
  /** Selector kind used for the cache key; the default branch resolves as "branch". */
  kind: SelectorKind;
  /** Branch or tag name, or the commit hash as given */
  value: string;
}

export function isCommitId(value: string): boolean {
  return COMMIT_ID.test(value);
}

/**
 * Strip the "refs/heads/" namespace from a ref name.
 */
export function branchName(ref: string): string {
  return ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
}

/**
 * Resolve a selector to the commit it currently points at.
 *
 * Branches and tags are looked up from the remote's ref advertisement only; no
 * objects are downloaded. An explicit commit hash is trusted as given after a
 * format check, and only proven to exist when it is fetched.
 */
export async function resolveReference(
  remote: RemoteAccess,
  repoUrl: string,
  selector: Selector,
  onProgress?: ProgressListener,
): Promise<ResolvedReference> {
  switch (selector.kind) {
    case "commit": {
      if (!isCommitId(selector.sha)) {
        throw new ResolutionError(
          describeSelector(selector),
          `Malformed commit hash "${selector.sha}": expected 40 or 64 hex characters`,
        );
      }
      return { commit: selector.sha.toLowerCase(), kind: "commit", value: selector.sha };
    }

    case "tag": {
      const ref = `refs/tags/${selector.name}`;
      const refs = await listRefs(remote, repoUrl, selector, [ref, `${ref}^{}`]);
      // Annotated tags advertise a peeled entry; lightweight tags point at the commit directly
      const commit = refs.get(`${ref}^{}`) ?? refs.get(ref);
      if (!commit) {
        throw new ResolutionError(describeSelector(selector), `Tag "${selector.name}" not found on ${repoUrl}`);
      }
      return { commit, kind: "tag", value: selector.name };
    }

    case "branch":
      return resolveBranch(remote, repoUrl, selector.name, selector);

    case "default": {
      let head: string;
      try {
        head = await remote.defaultBranch(repoUrl);
      } catch (err) {
        throw new ResolutionError(
          describeSelector(selector),
          `Could not determine default branch: ${messageOf(err)}`,
          { cause: err },
        );
      }
      const name = branchName(head);
      onProgress?.({ type: "default-branch", branch: name });
      return resolveBranch(remote, repoUrl, name, selector);
    }
  }
}

async function resolveBranch(
  remote: RemoteAccess,
  repoUrl: string,
  name: string,
  selector: Selector,
): Promise<ResolvedReference> {
  const ref = `refs/heads/${name}`;
  const commit = (await listRefs(remote, repoUrl, selector, [ref])).get(ref);
  if (!commit) {
    throw new ResolutionError(describeSelector(selector), `Branch "${name}" not found on ${repoUrl}`);
  }
  return { commit, kind: "branch", value: name };
}

async function listRefs(
  remote: RemoteAccess,
  repoUrl: string,
  selector: Selector,
  refNames: string[],
): Promise<Map<string, string>> {
  try {
    const refs = await remote.listRefs(repoUrl, refNames);
    return new Map(refs.map((r) => [r.name, r.commit]));
  } catch (err) {
    throw new ResolutionError(
      describeSelector(selector),
      `Could not resolve ${describeSelector(selector)}: ${messageOf(err)}`,
      { cause: err },
    );
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
