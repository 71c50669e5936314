import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

/**
 * A process-private scratch directory. Nothing removes it implicitly:
 * the owner calls release() once it is done with the checkout.
 */
export interface Workspace {
  readonly dir: string;
  readonly released: boolean;
  /** Remove the directory. Only the first call has an effect. */
  release(): Promise<void>;
}

export async function acquireWorkspace(prefix = "gitsnip-"): Promise<Workspace> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  let released = false;

  return {
    dir,
    get released() {
      return released;
    },
    async release() {
      if (released) return;
      released = true;
      await rm(dir, { recursive: true, force: true });
    },
  };
}
