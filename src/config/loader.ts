import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse as parseTOML } from "smol-toml";
import { snippetsConfigSchema } from "./schema.js";
import type { SnippetsConfig } from "./schema.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadedConfig extends SnippetsConfig {
  /** Absolute store directory after applying overrides */
  storeDir: string;
  /** Config file that was read, if one existed */
  source?: string;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load gitsnip.toml. A missing file means defaults. The store directory is
 * taken from, in order: `overrides.dir`, GITSNIP_DIR, the file, the default.
 */
export async function loadConfig(
  filePath: string,
  overrides: { dir?: string } = {},
): Promise<LoadedConfig> {
  const baseDir = dirname(resolve(filePath));

  let raw: string | undefined;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (!isNotFound(err)) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Cannot read ${filePath}: ${message}`);
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = parseTOML(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Invalid TOML in ${filePath}: ${message}`);
    }
  }

  const result = snippetsConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${filePath}:\n${issues}`);
  }

  const envDir = process.env["GITSNIP_DIR"] || undefined;
  const dir = overrides.dir ?? envDir ?? result.data.dir;

  return {
    ...result.data,
    dir,
    storeDir: resolve(baseDir, dir),
    ...(raw !== undefined ? { source: filePath } : {}),
  };
}
