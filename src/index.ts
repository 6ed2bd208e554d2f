/**
 * bufguard public API barrel.
 *
 * Discovery, editor adapters, fan-out, the hook handler and the ambient
 * pieces (config, logging, errors) that make up the library surface.
 * @module
 */

// Adapters
export { createEditorAction, editorActionFactory } from "./adapters/create-action.js";
export type { CreateActionDeps } from "./adapters/create-action.js";
export { NeovimAction } from "./adapters/neovim/neovim-action.js";
export type { NeovimActionOptions } from "./adapters/neovim/neovim-action.js";
export { exitStatus, launchNeovim } from "./adapters/neovim/neovim-launcher.js";
export type { LaunchNeovimOptions, NeovimExit } from "./adapters/neovim/neovim-launcher.js";
export { NeovimRpcClient } from "./adapters/neovim/msgpack-rpc.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { LogLevelName } from "./adapters/structured-logger.js";
export { VSCodeAction } from "./adapters/vscode/vscode-action.js";
export type { VSCodeActionOptions } from "./adapters/vscode/vscode-action.js";
export { RPC_ERROR_CODES, VSCodeRpcClient } from "./adapters/vscode/vscode-rpc.js";
export type { VSCodeMethod } from "./adapters/vscode/vscode-rpc.js";

// Config
export { configSchema, envSchema } from "./config/config-schema.js";
export { loadConfig } from "./config/load-config.js";
export type { BufguardConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";

// Core
export { FanOut } from "./core/fan-out.js";
export type { Broadcast, BroadcastSummary, FanOutOptions } from "./core/fan-out.js";
export {
  DENY_NOTIFICATION,
  denyReason,
  formatSelection,
  HookHandler,
} from "./core/hook-handler.js";
export type { DiscoverFn, HookHandlerDeps } from "./core/hook-handler.js";
export type {
  EditorAction,
  EditorActionFactory,
  EditorActionOptions,
} from "./core/interfaces/editor-action.js";
export { SideEffects } from "./core/side-effects.js";
export type { SideEffectsSummary } from "./core/side-effects.js";

// Discovery
export { discoverInstances } from "./discovery/instance-discovery.js";
export type { DiscoveryOptions } from "./discovery/instance-discovery.js";
export {
  computeSocketPath,
  hashDirectory,
  hashPath,
  parseSocketName,
  socketFileName,
} from "./discovery/socket-paths.js";
export type { ParsedSocketName } from "./discovery/socket-paths.js";

// Errors
export {
  BufguardError,
  ConfigError,
  EditorConnectionError,
  errorMessage,
  HookPayloadError,
  RpcProtocolError,
  RpcRemoteError,
  RpcTimeoutError,
  toBufguardError,
} from "./errors.js";

// Hook protocol
export type { HookOutput } from "./hook/hook-output.js";
export { renderHookOutput, serializeHookOutput } from "./hook/hook-output.js";
export { runHook } from "./hook/run-hook.js";
export type { RunHookOptions } from "./hook/run-hook.js";
export { decodeHookInput, decodeToolCall } from "./types/hook-input-schema.js";

// Interfaces
export type { Logger } from "./interfaces/logger.js";

// Types
export type {
  BufferStatus,
  EditorInstance,
  EditorKind,
  SelectionContext,
} from "./types/editor.js";
export { EDITOR_DISPLAY_NAMES, EDITOR_KINDS, isBlocking } from "./types/editor.js";
export type {
  AggregatedDecision,
  Decision,
  HookInput,
  HookResult,
  ModificationToolCall,
  PermissionDecision,
  ToolCall,
} from "./types/hook.js";
export { isModification, targetPaths } from "./types/hook.js";

// Utils
export { canonicalPath } from "./utils/canonical-path.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
