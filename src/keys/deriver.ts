import { shortHash } from "../utils/hash.js";
import type { SelectorKind } from "../selector.js";

const UNKNOWN_BASE_NAME = "unknown";

export interface CacheKey {
  /** `<url>-<selector>-<path>-<basename>`, stable across commits. */
  prefix: string;
  urlHash: string;
  selectorHash: string;
  pathHash: string;
  baseName: string;
}

/**
 * Final component of a slash-separated path, or "unknown" when there is none.
 */
export function baseNameOf(path: string): string {
  const last = path.split("/").pop();
  return last ? last : UNKNOWN_BASE_NAME;
}

/**
 * Derive the cache key for a (repository, selector, path) request.
 *
 * The key covers the selector as the caller expressed it, not the commit it
 * resolves to, so a branch that moves keeps the same prefix.
 */
export function deriveKey(
  repoUrl: string,
  selectorKind: SelectorKind,
  selectorValue: string,
  path: string,
): CacheKey {
  const urlHash = shortHash(repoUrl);
  const selectorHash = shortHash(`${selectorKind}-${selectorValue}`);
  const pathHash = shortHash(path);
  const baseName = baseNameOf(path);

  return {
    prefix: `${urlHash}-${selectorHash}-${pathHash}-${baseName}`,
    urlHash,
    selectorHash,
    pathHash,
    baseName,
  };
}
