import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, ConfigError } from "./loader.js";
import { generateDefaultConfig } from "./writer.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gitsnip-config-"));
    delete process.env["GITSNIP_DIR"];
  });

  afterEach(async () => {
    delete process.env["GITSNIP_DIR"];
    await rm(dir, { recursive: true });
  });

  it("returns defaults when the file is missing", async () => {
    const config = await loadConfig(join(dir, "gitsnip.toml"));
    expect(config).toEqual({
      version: 1,
      dir: ".snippets",
      extension: "",
      keep_workspace: false,
      git_timeout_ms: 0,
      storeDir: join(dir, ".snippets"),
    });
  });

  it("loads a valid config", async () => {
    const configPath = join(dir, "gitsnip.toml");
    await writeFile(
      configPath,
      `version = 1
dir = "docs/snippets"
extension = ".rs"
keep_workspace = true
`,
    );

    const config = await loadConfig(configPath);
    expect(config.storeDir).toBe(join(dir, "docs", "snippets"));
    expect(config.extension).toBe(".rs");
    expect(config.keep_workspace).toBe(true);
    expect(config.source).toBe(configPath);
  });

  it("prefers the explicit dir over GITSNIP_DIR and the file", async () => {
    const configPath = join(dir, "gitsnip.toml");
    await writeFile(configPath, `dir = "from-file"\n`);
    process.env["GITSNIP_DIR"] = "from-env";

    expect((await loadConfig(configPath)).storeDir).toBe(join(dir, "from-env"));
    expect((await loadConfig(configPath, { dir: "from-flag" })).storeDir).toBe(join(dir, "from-flag"));
  });

  it("throws ConfigError for invalid TOML", async () => {
    const configPath = join(dir, "gitsnip.toml");
    await writeFile(configPath, "this is not valid toml {{{}");
    await expect(loadConfig(configPath)).rejects.toThrow(ConfigError);
  });

  it("rejects an extension containing a hyphen", async () => {
    const configPath = join(dir, "gitsnip.toml");
    await writeFile(configPath, `extension = ".snip-v1"\n`);
    await expect(loadConfig(configPath)).rejects.toThrow(/extension/);
  });

  it("rejects an unsupported version", async () => {
    const configPath = join(dir, "gitsnip.toml");
    await writeFile(configPath, "version = 2\n");
    await expect(loadConfig(configPath)).rejects.toThrow(ConfigError);
  });

  it("round-trips the generated default config", async () => {
    const configPath = join(dir, "gitsnip.toml");
    await writeFile(configPath, generateDefaultConfig({ dir: "snips", extension: ".txt" }));

    const config = await loadConfig(configPath);
    expect(config.dir).toBe("snips");
    expect(config.extension).toBe(".txt");
    expect(config.keep_workspace).toBe(false);
  });
});
