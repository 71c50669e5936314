export { fetchSnippet } from "./snippets/fetch.js";
export type { FetchSnippetOptions, FetchSnippetResult, FetchStatus } from "./snippets/fetch.js";
export { validateRequest, requestFromFlags } from "./snippets/request.js";
export type { SnippetRequest } from "./snippets/request.js";
export { selectorFromFlags, describeSelector } from "./selector.js";
export type { Selector, SelectorKind, SelectorFlags } from "./selector.js";
export { deriveKey, baseNameOf } from "./keys/deriver.js";
export type { CacheKey } from "./keys/deriver.js";
export { resolveReference, isCommitId, branchName } from "./resolver/resolver.js";
export type { ResolvedReference } from "./resolver/resolver.js";
export { SnippetStore, DEFAULT_STORE_DIR } from "./store/store.js";
export type { SnippetRecord, SnippetStoreOptions } from "./store/store.js";
export { materialize, readCheckoutFile } from "./materializer/materializer.js";
export type { Checkout } from "./materializer/materializer.js";
export { acquireWorkspace } from "./materializer/workspace.js";
export type { Workspace } from "./materializer/workspace.js";
export { createGitRemote, gitRemote, GitError, parseLsRemote, parseSymref } from "./remote/git.js";
export type { RemoteAccess, RemoteRef, GitRemoteOptions } from "./remote/git.js";
export {
  SnippetError,
  ValidationError,
  ResolutionError,
  FetchError,
  FileNotFoundError,
  StorageError,
} from "./errors.js";
export type { Stage } from "./errors.js";
export type { ProgressEvent, ProgressListener } from "./progress.js";
export { loadConfig, ConfigError, generateDefaultConfig, snippetsConfigSchema, CONFIG_FILE } from "./config/index.js";
export type { LoadedConfig, SnippetsConfig, DefaultConfigOptions } from "./config/index.js";
export { exec, ExecError } from "./utils/exec.js";
export { sha256, shortHash } from "./utils/hash.js";
