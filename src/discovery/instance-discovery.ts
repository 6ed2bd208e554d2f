import { readdir } from "node:fs/promises";
import type { Logger } from "../interfaces/logger.js";
import type { EditorInstance } from "../types/editor.js";
import { noopLogger } from "../utils/noop-logger.js";
import { hashDirectory, parseSocketName, toInstance } from "./socket-paths.js";

export interface DiscoveryOptions {
  socketDir: string;
  logger?: Logger;
}

/**
 * List every editor instance whose socket is scoped to `cwd`, across all
 * known backend kinds. Never throws: an unreadable socket directory means no
 * instances. Order is unspecified.
 */
export async function discoverInstances(
  cwd: string,
  options: DiscoveryOptions,
): Promise<EditorInstance[]> {
  const logger = options.logger ?? noopLogger;
  const hash = await hashDirectory(cwd);

  const entries = await readdir(options.socketDir, { withFileTypes: true }).catch((err: unknown) => {
    logger.debug?.("Socket directory unreadable, assuming no editors", {
      socketDir: options.socketDir,
      error: err,
    });
    return null;
  });
  if (!entries) return [];

  const instances: EditorInstance[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) continue;

    const parsed = parseSocketName(entry.name, hash);
    if (!parsed.matched) {
      if (parsed.reason === "unknown-marker") {
        logger.debug?.("Skipping socket with unknown editor marker", {
          socket: entry.name,
          marker: parsed.marker,
        });
      }
      continue;
    }

    const instance = toInstance(options.socketDir, entry.name, hash);
    if (instance) instances.push(instance);
  }

  logger.debug?.("Discovered editor instances", {
    cwd,
    count: instances.length,
    sockets: instances.map((i) => i.socketPath),
  });
  return instances;
}
