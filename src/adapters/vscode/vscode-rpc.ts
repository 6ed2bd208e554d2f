/**
 * NDJSON request/response client for the VS Code extension socket.
 *
 * Request:  `{"id":1,"method":"buffer_status","params":{"file_path":"/abs/path"}}`
 * Response: `{"id":1,"result":{...}}` or `{"id":1,"error":{"code":-32601,"message":"..."}}`
 */

import { z } from "zod";
import { RpcProtocolError, RpcRemoteError } from "../../errors.js";
import { NDJSONLineBuffer, serializeNDJSON } from "../../utils/ndjson.js";
import { withUnixSocket } from "../unix-socket.js";

export type VSCodeMethod = "buffer_status" | "refresh_buffer" | "send_message" | "get_visual_selection";

/** Error codes the extension answers with. */
export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export interface VSCodeRequest {
  id: number;
  method: VSCodeMethod;
  params?: Record<string, unknown>;
}

export const responseSchema = z.object({
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

export const bufferStatusResultSchema = z.object({
  is_current: z.boolean(),
  has_unsaved_changes: z.boolean(),
});

export const successResultSchema = z.object({ success: z.boolean() });

export const selectionResultSchema = z
  .object({
    file_path: z.string(),
    start_line: z.number().int(),
    end_line: z.number().int(),
    content: z.string(),
  })
  .nullable();

export interface VSCodeRpcClientOptions {
  socketPath: string;
  timeoutMs: number;
}

export class VSCodeRpcClient {
  private nextId = 1;

  constructor(private readonly options: VSCodeRpcClientOptions) {}

  /** One connection per call: connect, send, read until the matching id, close. */
  async call<S extends z.ZodTypeAny>(
    method: VSCodeMethod,
    params: Record<string, unknown> | undefined,
    resultSchema: S,
  ): Promise<z.output<S>> {
    const request: VSCodeRequest = { id: this.nextId++, method };
    if (params !== undefined) request.params = params;

    const result = await withUnixSocket(
      { socketPath: this.options.socketPath, timeoutMs: this.options.timeoutMs, operation: method },
      async (socket) => {
        socket.write(serializeNDJSON(request));
        const lines = new NDJSONLineBuffer();
        for await (const chunk of socket) {
          if (!(chunk instanceof Uint8Array) && typeof chunk !== "string") continue;
          for (const line of lines.feed(chunk)) {
            const matched = matchResponse(line, request.id);
            if (matched.done) return matched.result;
          }
        }
        throw new RpcProtocolError(`Connection closed before ${method} response`);
      },
    );

    const parsed = resultSchema.safeParse(result);
    if (!parsed.success) {
      throw new RpcProtocolError(`Malformed ${method} result: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

type MatchOutcome = { done: true; result: unknown } | { done: false };

function matchResponse(line: string, id: number): MatchOutcome {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    throw new RpcProtocolError("Response is not valid JSON", { cause: err });
  }

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    throw new RpcProtocolError(`Malformed response: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  const response = parsed.data;
  // A parse-error reply cannot echo our id; it still answers this request.
  const isOurs = response.id === id || (response.id == null && response.error !== undefined);
  if (!isOurs) return { done: false };

  if (response.error) {
    throw new RpcRemoteError(response.error.message, response.error.code);
  }
  if (!("result" in response)) {
    throw new RpcProtocolError("Response has neither result nor error");
  }
  return { done: true, result: response.result };
}
