import type { CacheKey } from "./keys/deriver.js";
import type { ResolvedReference } from "./resolver/resolver.js";

/**
 * Progress notifications emitted while a snippet request runs. The core never
 * prints; the CLI renders these.
 */
export type ProgressEvent =
  | { type: "resolving"; url: string; selector: string }
  | { type: "default-branch"; branch: string }
  | { type: "resolved"; resolved: ResolvedReference }
  | { type: "key"; key: CacheKey }
  | { type: "cache-hit"; path: string }
  | { type: "cache-stale"; current: string; next: string }
  | { type: "cache-miss" }
  | { type: "fetching"; commit: string; workspace: string }
  | { type: "fetched"; path: string; bytes: number }
  | { type: "saved"; path: string }
  | { type: "workspace-kept"; workspace: string };

export type ProgressListener = (event: ProgressEvent) => void;
