import { realpath } from "node:fs/promises";
import { resolve } from "node:path";

/**
 * Resolve `path` against `cwd` and follow symlinks. A path that does not
 * exist yet (a file about to be written) keeps its lexical absolute form,
 * which is also what both editors fall back to for unsaved new buffers.
 */
export async function canonicalPath(path: string, cwd: string = process.cwd()): Promise<string> {
  const absolute = resolve(cwd, path);
  return realpath(absolute).catch(() => absolute);
}
