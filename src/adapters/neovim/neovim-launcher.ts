import { type ChildProcess, spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import { constants } from "node:os";
import { computeSocketPath } from "../../discovery/socket-paths.js";
import type { Logger } from "../../interfaces/logger.js";
import { noopLogger } from "../../utils/noop-logger.js";

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface LaunchNeovimOptions {
  binary: string;
  args: string[];
  cwd: string;
  socketDir: string;
  /** Defaults to this process's pid. */
  pid?: number;
  spawn?: SpawnFn;
  logger?: Logger;
}

export interface NeovimExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Start Neovim listening on the socket discovery expects for `cwd`, with the
 * terminal handed over to it. Resolves when Neovim exits.
 */
export async function launchNeovim(options: LaunchNeovimOptions): Promise<NeovimExit> {
  const spawn = options.spawn ?? nodeSpawn;
  const logger = options.logger ?? noopLogger;
  const socketPath = await computeSocketPath(
    options.cwd,
    "neovim",
    options.pid ?? process.pid,
    options.socketDir,
  );

  logger.debug?.("Launching Neovim", { binary: options.binary, socketPath });
  const child = spawn(options.binary, ["--listen", socketPath, ...options.args], {
    cwd: options.cwd,
    stdio: "inherit",
  });

  return new Promise<NeovimExit>((resolve, reject) => {
    child.once("error", (err) =>
      reject(new Error(`Failed to execute ${options.binary}: ${err.message}`, { cause: err })),
    );
    child.once("exit", (code, signal) => resolve({ code, signal }));
  });
}

/** Shell-style exit status for a finished child. */
export function exitStatus(exit: NeovimExit): number {
  if (exit.code !== null) return exit.code;
  return exit.signal ? 128 + constants.signals[exit.signal] : 1;
}
