/**
 * Minimal msgpack-RPC client for Neovim's `--listen` socket.
 *
 * Request:  `[0, msgid, method, params]`
 * Response: `[1, msgid, error, result]` where `error` is `[type, message]` or nil
 * Notifications (`[2, method, params]`) are skipped.
 */

import { decodeMultiStream, encode } from "@msgpack/msgpack";
import { z } from "zod";
import { RpcProtocolError, RpcRemoteError } from "../../errors.js";
import { withUnixSocket } from "../unix-socket.js";

export const MSGPACK_RPC_REQUEST = 0;
export const MSGPACK_RPC_RESPONSE = 1;
export const MSGPACK_RPC_NOTIFICATION = 2;

const responseSchema = z.tuple([
  z.literal(MSGPACK_RPC_RESPONSE),
  z.number().int(),
  z.unknown(),
  z.unknown(),
]);

const nvimErrorSchema = z.tuple([z.number(), z.string()]).rest(z.unknown());

const textDecoder = new TextDecoder();

/** Neovim may send strings as msgpack `bin`; turn those back into text. */
export function normalizeBinary(value: unknown): unknown {
  if (value instanceof Uint8Array) return textDecoder.decode(value);
  if (Array.isArray(value)) return value.map(normalizeBinary);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) out[key] = normalizeBinary(inner);
    return out;
  }
  return value;
}

function remoteError(error: unknown): RpcRemoteError {
  const parsed = nvimErrorSchema.safeParse(normalizeBinary(error));
  if (parsed.success) return new RpcRemoteError(parsed.data[1]);
  return new RpcRemoteError(typeof error === "string" ? error : JSON.stringify(error));
}

export interface NeovimRpcClientOptions {
  socketPath: string;
  timeoutMs: number;
}

export class NeovimRpcClient {
  private nextMsgId = 1;

  constructor(private readonly options: NeovimRpcClientOptions) {}

  /** Issue one API request on a fresh connection and return its result. */
  async request(method: string, params: unknown[]): Promise<unknown> {
    const msgId = this.nextMsgId++;

    return withUnixSocket(
      { socketPath: this.options.socketPath, timeoutMs: this.options.timeoutMs, operation: method },
      async (socket) => {
        socket.write(encode([MSGPACK_RPC_REQUEST, msgId, method, params]));

        for await (const message of decodeMultiStream(socket)) {
          const parsed = responseSchema.safeParse(message);
          if (!parsed.success) continue;

          const [, id, error, result] = parsed.data;
          if (id !== msgId) continue;
          if (error !== null && error !== undefined) throw remoteError(error);
          return normalizeBinary(result);
        }
        throw new RpcProtocolError(`Connection closed before ${method} response`);
      },
    );
  }

  /** `nvim_exec_lua(code, args)`: runs the chunk with `args` as its varargs. */
  execLua(code: string, args: unknown[] = []): Promise<unknown> {
    return this.request("nvim_exec_lua", [code, args]);
  }
}
