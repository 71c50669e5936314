import { ValidationError } from "./errors.js";

export type Selector =
  | { kind: "branch"; name: string }
  | { kind: "tag"; name: string }
  | { kind: "commit"; sha: string }
  | { kind: "default" };

/** Selector kinds that take part in cache keys. `default` resolves to a branch. */
export type SelectorKind = "branch" | "tag" | "commit";

export interface SelectorFlags {
  branch?: string;
  tag?: string;
  commitHash?: string;
}

/**
 * Build a selector from the mutually exclusive `--branch`, `--tag` and
 * `--commit-hash` flags. No flag means the remote's default branch.
 */
export function selectorFromFlags(flags: SelectorFlags): Selector {
  const given = [
    flags.branch !== undefined ? "--branch" : null,
    flags.tag !== undefined ? "--tag" : null,
    flags.commitHash !== undefined ? "--commit-hash" : null,
  ].filter((f): f is string => f !== null);

  if (given.length > 1) {
    throw new ValidationError(
      `Only one of --branch, --tag, or --commit-hash can be specified (got ${given.join(", ")})`,
    );
  }

  if (flags.branch !== undefined) return { kind: "branch", name: flags.branch };
  if (flags.tag !== undefined) return { kind: "tag", name: flags.tag };
  if (flags.commitHash !== undefined) return { kind: "commit", sha: flags.commitHash };
  return { kind: "default" };
}

export function describeSelector(selector: Selector): string {
  switch (selector.kind) {
    case "branch":
      return `branch "${selector.name}"`;
    case "tag":
      return `tag "${selector.name}"`;
    case "commit":
      return `commit ${selector.sha}`;
    case "default":
      return "default branch";
  }
}
