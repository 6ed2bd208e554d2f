import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";

/**
 * Unix socket paths are capped near 104 bytes, so fixtures live directly
 * under /tmp rather than the platform temp dir.
 */
export async function makeSocketDir(prefix = "bg-"): Promise<string> {
  return mkdtemp(join("/tmp", prefix));
}

export async function removeSocketDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
