import { isAbsolute, posix } from "node:path";
import { ValidationError } from "../errors.js";
import { selectorFromFlags } from "../selector.js";
import type { Selector, SelectorFlags } from "../selector.js";

export interface SnippetRequest {
  /** Remote repository URL (https, ssh, git, file or a local path) */
  url: string;
  selector: Selector;
  /** Slash-separated path of the file, relative to the repository root */
  path: string;
}

/**
 * Check a request before anything touches the network.
 */
export function validateRequest(request: SnippetRequest): SnippetRequest {
  if (!request.url) {
    throw new ValidationError("A repository URL is required");
  }
  // Keep the URL from being read as a git option
  if (request.url.startsWith("-")) {
    throw new ValidationError(`Invalid repository URL "${request.url}"`);
  }
  if (!request.path) {
    throw new ValidationError("A file path is required");
  }
  if (isAbsolute(request.path) || posix.isAbsolute(request.path)) {
    throw new ValidationError(`File path must be relative to the repository root: "${request.path}"`);
  }
  if (request.path.split("/").includes("..")) {
    throw new ValidationError(`File path must not leave the repository: "${request.path}"`);
  }
  return request;
}

/**
 * Build and validate a request from CLI-style flags.
 */
export function requestFromFlags(flags: SelectorFlags & { git?: string; path?: string }): SnippetRequest {
  return validateRequest({
    url: flags.git ?? "",
    selector: selectorFromFlags(flags),
    path: flags.path ?? "",
  });
}
