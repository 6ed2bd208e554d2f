import { z } from "zod";

const positiveMs = z.number().int().positive();

export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const configSchema = z.object({
  // Discovery
  socketDir: z.string().min(1).optional(),

  // Timeouts
  rpcTimeoutMs: positiveMs.optional(),
  sideEffectWaitMs: z.number().int().min(0).optional(),

  // Behaviour
  notifyOnDeny: z.boolean().optional(),
  logLevel: logLevelSchema.optional(),

  // CLI
  neovimBinary: z.string().min(1).optional(),
});

const envBoolean = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envMs = z.coerce.number().int();

/** Environment variable → config field, with string coercion per variable. */
export const envSchema = z.object({
  BUFGUARD_SOCKET_DIR: z.string().optional(),
  BUFGUARD_RPC_TIMEOUT_MS: envMs.optional(),
  BUFGUARD_SIDE_EFFECT_WAIT_MS: envMs.optional(),
  BUFGUARD_NOTIFY_ON_DENY: envBoolean.optional(),
  BUFGUARD_LOG_LEVEL: logLevelSchema.optional(),
  BUFGUARD_NVIM: z.string().optional(),
});
