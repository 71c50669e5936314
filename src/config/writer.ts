import { stringify } from "smol-toml";
import { DEFAULT_STORE_DIR } from "../store/store.js";

export interface DefaultConfigOptions {
  dir?: string;
  extension?: string;
  keepWorkspace?: boolean;
}

/**
 * Render a starter gitsnip.toml. Values go through smol-toml's stringify
 * for proper escaping.
 */
export function generateDefaultConfig(opts: DefaultConfigOptions = {}): string {
  const body = stringify({
    version: 1,
    dir: opts.dir ?? DEFAULT_STORE_DIR,
    extension: opts.extension ?? "",
    keep_workspace: opts.keepWorkspace ?? false,
    git_timeout_ms: 0,
  });

  return `# gitsnip configuration
# Snippets are stored as <dir>/<key>-<commit><extension>

${body.trimEnd()}
`;
}
