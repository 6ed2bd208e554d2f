#!/usr/bin/env node
import { realpath } from "node:fs/promises";
import { exitStatus, launchNeovim } from "../adapters/neovim/neovim-launcher.js";
import { parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { loadConfig } from "../config/load-config.js";
import { discoverInstances } from "../discovery/instance-discovery.js";
import { computeSocketPath, hashDirectory } from "../discovery/socket-paths.js";
import { BufguardError, ConfigError, errorMessage, HookPayloadError } from "../errors.js";
import { runHook } from "../hook/run-hook.js";
import type { ResolvedConfig } from "../types/config.js";
import { compareInstances, EDITOR_DISPLAY_NAMES, EDITOR_KINDS } from "../types/editor.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";

// ── Help ───────────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
  bufguard: keep the assistant's edits away from your unsaved buffers

  Usage: bufguard <command> [args]

  Commands:
    hook               Handle one hook event (JSON on stdin, JSON on stdout)
    neovim [args...]   Start Neovim listening on this directory's socket
    info               Show the socket paths and editors for this directory

  Options:
    --version, -V      Print the version
    --help, -h         Show this help

  Environment:
    BUFGUARD_SOCKET_DIR           Socket directory (default: /tmp)
    BUFGUARD_RPC_TIMEOUT_MS       Per-editor RPC timeout (default: 2000)
    BUFGUARD_SIDE_EFFECT_WAIT_MS  Wait for refresh/notify after responding (default: 2000)
    BUFGUARD_NOTIFY_ON_DENY       Notify editors when an edit is denied (default: true)
    BUFGUARD_LOG_LEVEL            debug | info | warn | error (default: warn)
    BUFGUARD_NVIM                 Neovim binary (default: nvim)
`);
}

// ── Commands ───────────────────────────────────────────────────────────────

function createLogger(config: ResolvedConfig, component: string): StructuredLogger {
  return new StructuredLogger({ component, level: parseLogLevel(config.logLevel) });
}

async function readStdin(): Promise<string> {
  let text = "";
  process.stdin.setEncoding("utf8");
  for await (const chunk of process.stdin) text += String(chunk);
  return text;
}

async function hookCommand(): Promise<never> {
  const config = loadConfig();
  const logger = createLogger(config, "hook");
  const raw = await readStdin();
  let flushed: Promise<void> = Promise.resolve();
  await runHook(raw, {
    config,
    logger,
    write: (text) => {
      flushed = new Promise<void>((resolve) => process.stdout.write(text, () => resolve()));
    },
  });
  await flushed;
  // Abandoned side effects may still hold sockets open; the wait bound is final.
  process.exit(0);
}

async function neovimCommand(args: string[]): Promise<number> {
  const config = loadConfig();
  const exit = await launchNeovim({
    binary: config.neovimBinary,
    args,
    cwd: process.cwd(),
    socketDir: config.socketDir,
    logger: createLogger(config, "neovim"),
  });
  return exitStatus(exit);
}

async function infoCommand(): Promise<number> {
  const config = loadConfig();
  const cwd = process.cwd();
  const canonical = await realpath(cwd);
  const instances = await discoverInstances(cwd, {
    socketDir: config.socketDir,
    logger: createLogger(config, "info"),
  });

  console.log(`Directory:   ${canonical}`);
  console.log(`Hash:        ${await hashDirectory(cwd)}`);
  for (const kind of EDITOR_KINDS) {
    const label = `${EDITOR_DISPLAY_NAMES[kind]} socket:`.padEnd(20);
    console.log(`${label} ${await computeSocketPath(cwd, kind, process.pid, config.socketDir)}`);
  }

  if (instances.length === 0) {
    console.log("\nNo running editors found.");
    return 0;
  }
  console.log("\nRunning editors:");
  for (const instance of [...instances].sort(compareInstances)) {
    const pid = instance.pid === undefined ? "" : ` (pid ${instance.pid})`;
    console.log(`  ${EDITOR_DISPLAY_NAMES[instance.kind]}${pid}: ${instance.socketPath}`);
  }
  return 0;
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv.slice(2);
  switch (command) {
    case "hook":
      return hookCommand();
    case "neovim":
      return neovimCommand(rest);
    case "info":
      return infoCommand();
    case "--version":
    case "-V":
      console.log(resolvePackageVersion(import.meta.url, ["../../package.json", "../package.json"]));
      return 0;
    case "--help":
    case "-h":
    case undefined:
      printHelp();
      return command === undefined ? 1 : 0;
    default:
      console.error(`Unknown command: ${command}\nRun with --help for usage.`);
      return 1;
  }
}

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof HookPayloadError || err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
    } else if (err instanceof BufguardError) {
      console.error(`Error [${err.code}]: ${err.message}`);
    } else {
      console.error(`Fatal error: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  },
);
