import { deriveKey } from "../keys/deriver.js";
import type { CacheKey } from "../keys/deriver.js";
import { materialize, readCheckoutFile } from "../materializer/materializer.js";
import type { Checkout } from "../materializer/materializer.js";
import type { ProgressListener } from "../progress.js";
import { gitRemote } from "../remote/git.js";
import type { RemoteAccess } from "../remote/git.js";
import { resolveReference } from "../resolver/resolver.js";
import type { ResolvedReference } from "../resolver/resolver.js";
import { describeSelector } from "../selector.js";
import type { SnippetStore, SnippetRecord } from "../store/store.js";
import { validateRequest } from "./request.js";
import type { SnippetRequest } from "./request.js";

export interface FetchSnippetOptions {
  store: SnippetStore;
  remote?: RemoteAccess;
  onProgress?: ProgressListener;
  /** Leave the fetch workspace on disk after a successful fetch */
  keepWorkspace?: boolean;
}

export type FetchStatus = "up-to-date" | "created" | "updated";

export interface FetchSnippetResult {
  status: FetchStatus;
  record: SnippetRecord;
  key: CacheKey;
  resolved: ResolvedReference;
  /** Commit of the record this fetch replaced */
  previousCommit?: string;
  /** Set when keepWorkspace left the checkout on disk */
  workspace?: string;
}

/**
 * Make sure the store holds the requested file at the commit its selector
 * currently resolves to, fetching it only when the cached copy is missing or
 * stale. Nothing is retried; a failure leaves the previous record in place.
 */
export async function fetchSnippet(
  request: SnippetRequest,
  opts: FetchSnippetOptions,
): Promise<FetchSnippetResult> {
  const { store, onProgress } = opts;
  const remote = opts.remote ?? gitRemote;
  const { url, selector, path } = validateRequest(request);

  onProgress?.({ type: "resolving", url, selector: describeSelector(selector) });
  const resolved = await resolveReference(remote, url, selector, onProgress);
  onProgress?.({ type: "resolved", resolved });

  const key = deriveKey(url, resolved.kind, resolved.value, path);
  onProgress?.({ type: "key", key });

  const existing = await store.findByPrefix(key.prefix);
  if (existing && store.isFresh(existing, resolved.commit)) {
    onProgress?.({ type: "cache-hit", path: existing.path });
    return { status: "up-to-date", record: existing, key, resolved };
  }
  if (existing) {
    onProgress?.({ type: "cache-stale", current: existing.commit, next: resolved.commit });
  } else {
    onProgress?.({ type: "cache-miss" });
  }

  const checkout = await materialize(remote, url, resolved.commit, (workspace) =>
    onProgress?.({ type: "fetching", commit: resolved.commit, workspace }),
  );

  let record: SnippetRecord;
  try {
    const content = await readCheckoutFile(checkout, path);
    onProgress?.({ type: "fetched", path, bytes: content.byteLength });
    record = await store.put(key.prefix, resolved.commit, content);
    onProgress?.({ type: "saved", path: record.path });
  } catch (err) {
    await checkout.workspace.release();
    throw err;
  }

  const workspace = await finishCheckout(checkout, opts.keepWorkspace ?? false, onProgress);

  return {
    status: existing ? "updated" : "created",
    record,
    key,
    resolved,
    ...(existing ? { previousCommit: existing.commit } : {}),
    ...(workspace ? { workspace } : {}),
  };
}

async function finishCheckout(
  checkout: Checkout,
  keep: boolean,
  onProgress?: ProgressListener,
): Promise<string | undefined> {
  if (keep) {
    onProgress?.({ type: "workspace-kept", workspace: checkout.workspace.dir });
    return checkout.workspace.dir;
  }
  await checkout.workspace.release();
  return undefined;
}
