/** Pipeline stage a {@link SnippetError} was raised from. */
export type Stage = "validate" | "resolve" | "fetch" | "read" | "store";

/**
 * Base class for every failure of a snippet request. The stage names the step
 * that failed; the underlying error, if any, is kept as `cause`.
 */
export class SnippetError extends Error {
  constructor(
    public readonly stage: Stage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SnippetError";
  }
}

/** Conflicting selectors or a malformed request. Raised before any network activity. */
export class ValidationError extends SnippetError {
  constructor(message: string) {
    super("validate", message);
    this.name = "ValidationError";
  }
}

export class ResolutionError extends SnippetError {
  constructor(
    public readonly selector: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("resolve", message, options);
    this.name = "ResolutionError";
  }
}

export class FetchError extends SnippetError {
  constructor(
    public readonly commit: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("fetch", message, options);
    this.name = "FetchError";
  }
}

/** The commit was fetched but does not contain the requested file. */
export class FileNotFoundError extends SnippetError {
  constructor(
    public readonly path: string,
    public readonly commit: string,
  ) {
    super("read", `File "${path}" not found at commit ${commit}`);
    this.name = "FileNotFoundError";
  }
}

export class StorageError extends SnippetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("store", message, options);
    this.name = "StorageError";
  }
}
