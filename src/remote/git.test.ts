import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, writeFile, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createGitRemote, GitError, parseLsRemote, parseSymref } from "./git.js";
import { exec } from "../utils/exec.js";

const SHA_A = "a".repeat(40);
const SHA_B = "b".repeat(40);

describe("parseLsRemote", () => {
  it("parses sha/ref pairs", () => {
    const out = `${SHA_A}\trefs/heads/main\n${SHA_B}\trefs/tags/v1^{}\n`;
    expect(parseLsRemote(out)).toEqual([
      { commit: SHA_A, name: "refs/heads/main" },
      { commit: SHA_B, name: "refs/tags/v1^{}" },
    ]);
  });

  it("skips symref and blank lines", () => {
    const out = `ref: refs/heads/main\tHEAD\n${SHA_A}\tHEAD\n\n`;
    expect(parseLsRemote(out)).toEqual([{ commit: SHA_A, name: "HEAD" }]);
  });
});

describe("parseSymref", () => {
  it("returns the HEAD target", () => {
    expect(parseSymref(`ref: refs/heads/trunk\tHEAD\n${SHA_A}\tHEAD\n`)).toBe("refs/heads/trunk");
  });

  it("returns undefined without a symref line", () => {
    expect(parseSymref(`${SHA_A}\tHEAD\n`)).toBeUndefined();
  });
});

describe("createGitRemote", () => {
  let tmpDir: string;
  let repoDir: string;
  let head: string;
  const remote = createGitRemote();

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "gitsnip-remote-"));
    repoDir = join(tmpDir, "repo");

    await mkdir(join(repoDir, "src"), { recursive: true });
    await exec("git", ["init", "--initial-branch=trunk"], { cwd: repoDir });
    await exec("git", ["config", "user.email", "test@test.com"], { cwd: repoDir });
    await exec("git", ["config", "user.name", "Test"], { cwd: repoDir });
    await exec("git", ["config", "uploadpack.allowAnySHA1InWant", "true"], { cwd: repoDir });
    await writeFile(join(repoDir, "src", "lib.txt"), "first\n");
    await exec("git", ["add", "."], { cwd: repoDir });
    await exec("git", ["commit", "-m", "initial"], { cwd: repoDir });
    head = (await exec("git", ["rev-parse", "HEAD"], { cwd: repoDir })).stdout.trim();
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true });
  });

  it("reads the default branch from the HEAD symref", async () => {
    expect(await remote.defaultBranch(repoDir)).toBe("refs/heads/trunk");
  });

  it("lists only the exact refs requested", async () => {
    await exec("git", ["branch", "feature/trunk"], { cwd: repoDir });
    const refs = await remote.listRefs(repoDir, ["refs/heads/trunk"]);
    expect(refs).toEqual([{ name: "refs/heads/trunk", commit: head }]);
  });

  it("returns no refs for an unknown name", async () => {
    expect(await remote.listRefs(repoDir, ["refs/heads/nope"])).toEqual([]);
  });

  it("fails with GitError for an unreachable remote", async () => {
    await expect(remote.listRefs(join(tmpDir, "missing"), ["refs/heads/trunk"])).rejects.toThrow(GitError);
  });

  it("fetches a single commit and checks it out", async () => {
    const work = join(tmpDir, "work");
    await mkdir(work);
    await remote.init(work);
    await remote.fetchCommit(work, repoDir, head);
    await remote.checkout(work, head);

    expect(await readFile(join(work, "src", "lib.txt"), "utf-8")).toBe("first\n");
    const { stdout } = await exec("git", ["rev-parse", "HEAD"], { cwd: work });
    expect(stdout.trim()).toBe(head);
  });
});
