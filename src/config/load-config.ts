import { ConfigError } from "../errors.js";
import { type BufguardConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import { envSchema } from "./config-schema.js";

/**
 * Build the resolved configuration from `BUFGUARD_*` environment variables.
 * Unset or empty variables fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("BUFGUARD_") && value !== undefined && value !== "") {
      present[key] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${details}`, { cause: parsed.error });
  }

  const vars = parsed.data;
  const config: BufguardConfig = {
    socketDir: vars.BUFGUARD_SOCKET_DIR,
    rpcTimeoutMs: vars.BUFGUARD_RPC_TIMEOUT_MS,
    sideEffectWaitMs: vars.BUFGUARD_SIDE_EFFECT_WAIT_MS,
    notifyOnDeny: vars.BUFGUARD_NOTIFY_ON_DENY,
    logLevel: vars.BUFGUARD_LOG_LEVEL,
    neovimBinary: vars.BUFGUARD_NVIM,
  };
  return resolveConfig(config);
}
