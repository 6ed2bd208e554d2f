import { readFileSync } from "node:fs";
import { z } from "zod";
import { errnoCode } from "../errors.js";

const manifestSchema = z.object({ version: z.string().min(1) });

/**
 * Walk a list of `package.json` candidates, relative to `importMetaUrl`, and
 * return the first non-empty `version`. Missing files and manifests without a
 * usable version are skipped; anything else unreadable is rethrown.
 */
export function resolvePackageVersion(importMetaUrl: string, candidates: string[]): string {
  for (const candidate of candidates) {
    const manifest = readManifest(new URL(candidate, importMetaUrl));
    const parsed = manifestSchema.safeParse(manifest);
    if (parsed.success) return parsed.data.version;
  }
  return "unknown";
}

function readManifest(url: URL): unknown {
  let text: string;
  try {
    text = readFileSync(url, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw err;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
