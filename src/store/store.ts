import { mkdir, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { randomBytes } from "node:crypto";
import { StorageError } from "../errors.js";

export const DEFAULT_STORE_DIR = ".snippets";

export interface SnippetRecord {
  /** Cache-key prefix shared by every version of this snippet */
  prefix: string;
  /** Commit the stored bytes were read from */
  commit: string;
  /** File name inside the store */
  name: string;
  /** Path to the file (store dir joined with name) */
  path: string;
}

export interface SnippetStoreOptions {
  /** Fixed extension appended after the commit id, e.g. ".rs". Empty by default. */
  extension?: string;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * A directory of `<prefix>-<commit><ext>` files, at most one per prefix.
 *
 * Records are published by rename, so a reader sees either the old record or
 * the new one. Hidden files are in-flight writes and never count as records.
 */
export class SnippetStore {
  readonly dir: string;
  readonly extension: string;

  constructor(dir: string, opts: SnippetStoreOptions = {}) {
    this.dir = dir;
    this.extension = opts.extension ?? "";
  }

  recordName(prefix: string, commit: string): string {
    return `${prefix}-${commit}${this.extension}`;
  }

  /**
   * Split a store file name into prefix and commit. The commit is the last
   * hyphen-delimited segment, up to any extension. Records written under a
   * different extension setting still parse, so they are found and replaced.
   */
  parseName(name: string): { prefix: string; commit: string } | null {
    if (name.startsWith(".")) return null;
    const dash = name.lastIndexOf("-");
    if (dash <= 0) return null;
    // commit ids are hex, so the first dot starts the extension
    const commit = name.slice(dash + 1).split(".")[0];
    if (!commit) return null;
    return { prefix: name.slice(0, dash), commit };
  }

  private async entries(): Promise<string[]> {
    try {
      return (await readdir(this.dir)).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError(`Failed to read snippet store ${this.dir}`, { cause: err });
    }
  }

  private toRecord(name: string): SnippetRecord | null {
    const parsed = this.parseName(name);
    if (!parsed) return null;
    return { ...parsed, name, path: join(this.dir, name) };
  }

  async findByPrefix(prefix: string): Promise<SnippetRecord | null> {
    for (const name of await this.entries()) {
      const record = this.toRecord(name);
      if (record?.prefix === prefix) return record;
    }
    return null;
  }

  async list(): Promise<SnippetRecord[]> {
    const records: SnippetRecord[] = [];
    for (const name of await this.entries()) {
      const record = this.toRecord(name);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Fresh iff the record was read from the commit the selector resolves to
   * now. A record named under another extension setting is stale.
   */
  isFresh(record: SnippetRecord, commit: string): boolean {
    return record.commit === commit && record.name === this.recordName(record.prefix, commit);
  }

  /**
   * Store `content` as the record for `prefix`, replacing any previous record.
   * The stale record is removed only once the new bytes are on disk, directly
   * before they are renamed into place.
   */
  async put(prefix: string, commit: string, content: Uint8Array): Promise<SnippetRecord> {
    const name = this.recordName(prefix, commit);
    const target = join(this.dir, name);
    const temp = join(this.dir, `.${name}.${randomBytes(4).toString("hex")}.tmp`);

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(temp, content);
    } catch (err) {
      await rm(temp, { force: true });
      throw new StorageError(`Failed to write snippet ${target}`, { cause: err });
    }

    const stale = await this.findByPrefix(prefix);
    try {
      if (stale && stale.name !== name) {
        await rm(stale.path, { force: true });
      }
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw new StorageError(`Failed to publish snippet ${target}`, { cause: err });
    }

    return { prefix, commit, name, path: target };
  }

  async removeIfPresent(prefix: string): Promise<SnippetRecord | null> {
    const record = await this.findByPrefix(prefix);
    if (!record) return null;
    try {
      await rm(record.path, { force: true });
    } catch (err) {
      throw new StorageError(`Failed to remove snippet ${record.path}`, { cause: err });
    }
    return record;
  }
}
