/**
 * Deterministic socket naming shared with the editor side.
 *
 * Pattern: `<dir>/<blake3(canonical cwd)>-<pid>.sock` for Neovim and
 * `<dir>/<blake3(canonical cwd)>-vscode-<pid>.sock` for the VS Code extension.
 * @module
 */

import { realpath } from "node:fs/promises";
import { join, resolve } from "node:path";
import { blake3 } from "@noble/hashes/blake3";
import { bytesToHex } from "@noble/hashes/utils";
import type { EditorInstance, EditorKind } from "../types/editor.js";

const SOCKET_SUFFIX = ".sock";

/** Kind marker inserted between hash and pid; Neovim sockets carry none. */
const KIND_MARKERS = new Map<string, EditorKind>([["vscode", "vscode"]]);

/** Hex BLAKE3 hash (64 chars) of an already canonical directory path. */
export function hashPath(canonicalDir: string): string {
  return bytesToHex(blake3(canonicalDir));
}

/** Canonicalize `cwd` and hash it. */
export async function hashDirectory(cwd: string): Promise<string> {
  const absolute = resolve(cwd);
  // Directories that do not exist hash by their lexical path.
  const canonical = await realpath(absolute).catch(() => absolute);
  return hashPath(canonical);
}

export function socketFileName(hash: string, kind: EditorKind, pid: number): string {
  return kind === "neovim" ? `${hash}-${pid}${SOCKET_SUFFIX}` : `${hash}-${kind}-${pid}${SOCKET_SUFFIX}`;
}

export async function computeSocketPath(
  cwd: string,
  kind: EditorKind,
  pid: number,
  socketDir: string,
): Promise<string> {
  return join(socketDir, socketFileName(await hashDirectory(cwd), kind, pid));
}

export type ParsedSocketName =
  | { matched: true; kind: EditorKind; pid?: number }
  | { matched: false; reason: "foreign" | "unknown-marker"; marker?: string };

function parsePid(text: string): number | undefined {
  if (!/^\d+$/.test(text)) return undefined;
  const pid = Number.parseInt(text, 10);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : undefined;
}

/**
 * Classify one directory entry against the directory hash. Entries of other
 * directories are "foreign"; markers this build does not know are skipped.
 */
export function parseSocketName(fileName: string, hash: string): ParsedSocketName {
  const prefix = `${hash}-`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(SOCKET_SUFFIX)) {
    return { matched: false, reason: "foreign" };
  }

  const rest = fileName.slice(prefix.length, -SOCKET_SUFFIX.length);
  if (rest.length === 0) return { matched: false, reason: "foreign" };

  const dash = rest.indexOf("-");
  if (dash === -1) {
    const pid = parsePid(rest);
    return pid === undefined ? { matched: true, kind: "neovim" } : { matched: true, kind: "neovim", pid };
  }

  const marker = rest.slice(0, dash);
  const kind = KIND_MARKERS.get(marker);
  if (!kind) return { matched: false, reason: "unknown-marker", marker };

  const pid = parsePid(rest.slice(dash + 1));
  return pid === undefined ? { matched: true, kind } : { matched: true, kind, pid };
}

export function toInstance(socketDir: string, fileName: string, hash: string): EditorInstance | null {
  const parsed = parseSocketName(fileName, hash);
  if (!parsed.matched) return null;
  const instance: EditorInstance = { kind: parsed.kind, socketPath: join(socketDir, fileName) };
  if (parsed.pid !== undefined) instance.pid = parsed.pid;
  return instance;
}
