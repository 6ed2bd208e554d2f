import type { z } from "zod";
import { configSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Runtime configuration; every field is optional on input. */
export interface BufguardConfig {
  /** Directory holding editor sockets */
  socketDir?: string; // default: "/tmp"

  /** Per-instance bound for one RPC round trip, connect included */
  rpcTimeoutMs?: number; // default: 2000
  /** How long the CLI lingers for refresh/notify broadcasts after responding */
  sideEffectWaitMs?: number; // default: 2000

  /** Show a warning in every instance when an edit is denied */
  notifyOnDeny?: boolean; // default: true
  logLevel?: "debug" | "info" | "warn" | "error"; // default: "warn"

  neovimBinary?: string; // default: "nvim"
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<BufguardConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  socketDir: "/tmp",
  rpcTimeoutMs: 2000,
  sideEffectWaitMs: 2000,
  notifyOnDeny: true,
  logLevel: "warn",
  neovimBinary: "nvim",
};

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
}

export function resolveConfig(config: BufguardConfig = {}): ResolvedConfig {
  const validation = configSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(validation.error)}`, {
      cause: validation.error,
    });
  }

  const resolved: ResolvedConfig = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(validation.data)) {
    if (value !== undefined) Object.assign(resolved, { [key]: value });
  }
  return resolved;
}
