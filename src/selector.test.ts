import { describe, it, expect } from "vitest";
import { describeSelector, selectorFromFlags } from "./selector.js";
import { ValidationError } from "./errors.js";

describe("selectorFromFlags", () => {
  it("defaults to the remote's default branch", () => {
    expect(selectorFromFlags({})).toEqual({ kind: "default" });
  });

  it("builds each single-flag variant", () => {
    expect(selectorFromFlags({ branch: "main" })).toEqual({ kind: "branch", name: "main" });
    expect(selectorFromFlags({ tag: "v1.0.0" })).toEqual({ kind: "tag", name: "v1.0.0" });
    expect(selectorFromFlags({ commitHash: "abc" })).toEqual({ kind: "commit", sha: "abc" });
  });

  it.each([
    [{ branch: "main", tag: "v1" }],
    [{ branch: "main", commitHash: "abc" }],
    [{ tag: "v1", commitHash: "abc" }],
    [{ branch: "main", tag: "v1", commitHash: "abc" }],
  ])("rejects conflicting flags %o", (flags) => {
    expect(() => selectorFromFlags(flags)).toThrow(ValidationError);
  });

  it("counts an empty value as supplied", () => {
    expect(() => selectorFromFlags({ branch: "", tag: "v1" })).toThrow(
      "Only one of --branch, --tag, or --commit-hash can be specified (got --branch, --tag)",
    );
  });
});

describe("describeSelector", () => {
  it("names the selector", () => {
    expect(describeSelector({ kind: "branch", name: "dev" })).toBe('branch "dev"');
    expect(describeSelector({ kind: "default" })).toBe("default branch");
  });
});
