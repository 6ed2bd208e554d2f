export class BufguardError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BufguardError";
    this.code = code;
  }
}

// ── Fatal errors (surface to the CLI) ──

export class HookPayloadError extends BufguardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "HOOK_PAYLOAD", options);
    this.name = "HookPayloadError";
  }
}

export class ConfigError extends BufguardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Per-instance errors (absorbed inside the adapters) ──

export class EditorConnectionError extends BufguardError {
  readonly socketPath: string;

  constructor(socketPath: string, options?: ErrorOptions) {
    super(`Failed to connect to editor socket ${socketPath}`, "EDITOR_CONNECTION", options);
    this.name = "EditorConnectionError";
    this.socketPath = socketPath;
  }
}

export class RpcTimeoutError extends BufguardError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "RPC_TIMEOUT");
    this.name = "RpcTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class RpcProtocolError extends BufguardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "RPC_PROTOCOL", options);
    this.name = "RpcProtocolError";
  }
}

/** Error object returned by the editor itself (JSON-RPC error, nvim API error). */
export class RpcRemoteError extends BufguardError {
  readonly remoteCode: number | undefined;

  constructor(message: string, remoteCode?: number) {
    super(remoteCode === undefined ? message : `RPC error ${remoteCode}: ${message}`, "RPC_REMOTE");
    this.name = "RpcRemoteError";
    this.remoteCode = remoteCode;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to BufguardError (preserves cause chain). */
export function toBufguardError(value: unknown): BufguardError {
  if (value instanceof BufguardError) return value;
  if (value instanceof Error) return new BufguardError(value.message, "UNKNOWN", { cause: value });
  return new BufguardError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Node errno code (`ENOENT`, `ECONNREFUSED`, ...) of a thrown value, if any. */
export function errnoCode(value: unknown): string | undefined {
  if (value instanceof Error && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}
