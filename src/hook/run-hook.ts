import { editorActionFactory } from "../adapters/create-action.js";
import type { EditorActionFactory } from "../core/interfaces/editor-action.js";
import { FanOut } from "../core/fan-out.js";
import { type DiscoverFn, HookHandler } from "../core/hook-handler.js";
import { SideEffects } from "../core/side-effects.js";
import { discoverInstances } from "../discovery/instance-discovery.js";
import type { Logger } from "../interfaces/logger.js";
import type { ResolvedConfig } from "../types/config.js";
import { decodeHookInput } from "../types/hook-input-schema.js";
import { noopLogger } from "../utils/noop-logger.js";
import { serializeHookOutput } from "./hook-output.js";

export interface RunHookOptions {
  config: ResolvedConfig;
  /** Receives the single response line. */
  write: (text: string) => void;
  logger?: Logger;
  discover?: DiscoverFn;
  createAction?: EditorActionFactory;
}

/**
 * One hook invocation end to end: decode, decide, respond, then give pending
 * refreshes and notifications up to `sideEffectWaitMs` to finish.
 *
 * Throws HookPayloadError before anything is written when `raw` is not a
 * valid hook payload.
 */
export async function runHook(raw: string, options: RunHookOptions): Promise<void> {
  const { config } = options;
  const logger = options.logger ?? noopLogger;
  const input = decodeHookInput(raw);

  const discover =
    options.discover ??
    ((cwd: string) => discoverInstances(cwd, { socketDir: config.socketDir, logger }));
  const createAction =
    options.createAction ?? editorActionFactory({ timeoutMs: config.rpcTimeoutMs, logger });

  const handler = new HookHandler({
    discover,
    fanOut: new FanOut({ createAction, timeoutMs: config.rpcTimeoutMs, logger }),
    notifyOnDeny: config.notifyOnDeny,
    logger,
  });

  const effects = new SideEffects(logger);
  const result = await handler.handle(input, effects);
  options.write(`${serializeHookOutput(result)}\n`);

  if (effects.size > 0) await effects.settled(config.sideEffectWaitMs);
}
