import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TEMP_DIR_PREFIX } from "@slidetext/utils";

/**
 * Runs `fn` with a fresh private directory under `parent` and removes the
 * directory afterwards, whether `fn` resolves or throws.
 */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
  parent: string = os.tmpdir(),
): Promise<T> {
  const dir = await mkdtemp(path.join(parent, TEMP_DIR_PREFIX));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true }).catch((err) =>
      console.error("[file-extract] temp cleanup failed for", dir, err),
    );
  }
}
