import { z } from "zod/v4";
import { DEFAULT_STORE_DIR } from "../store/store.js";

export const CONFIG_FILE = "gitsnip.toml";

/**
 * Extensions sit after the commit id in record names, so they must not
 * contain the hyphen the commit is split on.
 */
const extensionSchema = z.string().check(
  z.refine(
    (ext) => ext === "" || /^\.[^/\\-]+$/.test(ext),
    'Extension must be empty or start with "." and contain no "/", "\\" or "-"',
  ),
);

export const snippetsConfigSchema = z.object({
  version: z.literal(1).default(1),
  /** Store directory, relative to the config file */
  dir: z.string().min(1, "dir must not be empty").default(DEFAULT_STORE_DIR),
  extension: extensionSchema.default(""),
  keep_workspace: z.boolean().default(false),
  /** Per git command timeout in milliseconds; 0 disables it */
  git_timeout_ms: z.number().int().nonnegative().default(0),
});

export type SnippetsConfig = z.infer<typeof snippetsConfigSchema>;
