import { z } from "zod";
import type { EditorAction, EditorActionOptions } from "../../core/interfaces/editor-action.js";
import { RpcProtocolError } from "../../errors.js";
import type { Logger } from "../../interfaces/logger.js";
import {
  type BufferStatus,
  CLEAN_BUFFER,
  type EditorInstance,
  type SelectionContext,
} from "../../types/editor.js";
import { canonicalPath } from "../../utils/canonical-path.js";
import { noopLogger } from "../../utils/noop-logger.js";
import {
  BUFFER_STATUS_LUA,
  REFRESH_BUFFER_LUA,
  SEND_MESSAGE_LUA,
  VISUAL_SELECTION_LUA,
} from "./lua-scripts.js";
import { NeovimRpcClient } from "./msgpack-rpc.js";

const bufferStatusSchema = z.object({
  is_current: z.boolean(),
  has_unsaved_changes: z.boolean(),
});

const selectionSchema = z
  .object({
    file_path: z.string(),
    start_line: z.number().int(),
    end_line: z.number().int(),
    content: z.string(),
  })
  .nullable();

export interface NeovimActionOptions extends EditorActionOptions {
  logger?: Logger;
}

/** EditorAction over Neovim's msgpack-RPC socket; one `nvim_exec_lua` per call. */
export class NeovimAction implements EditorAction {
  readonly kind = "neovim" as const;
  private readonly client: NeovimRpcClient;
  private readonly logger: Logger;
  private readonly cwd: string | undefined;

  constructor(
    readonly instance: EditorInstance,
    options: NeovimActionOptions,
  ) {
    this.client = new NeovimRpcClient({ socketPath: instance.socketPath, timeoutMs: options.timeoutMs });
    this.logger = options.logger ?? noopLogger;
    this.cwd = options.cwd;
  }

  async bufferStatus(path: string): Promise<BufferStatus> {
    const filePath = await canonicalPath(path, this.cwd);
    try {
      const result = await this.exec("buffer_status", BUFFER_STATUS_LUA, [filePath], bufferStatusSchema);
      return { isCurrent: result.is_current, hasUnsavedChanges: result.has_unsaved_changes };
    } catch (err) {
      this.absorb("buffer_status", err);
      return { ...CLEAN_BUFFER };
    }
  }

  async refreshBuffer(path: string): Promise<boolean> {
    const filePath = await canonicalPath(path, this.cwd);
    try {
      const reloaded = await this.exec("refresh_buffer", REFRESH_BUFFER_LUA, [filePath], z.boolean());
      this.logger.debug?.("Neovim refresh finished", {
        socket: this.instance.socketPath,
        filePath,
        reloaded,
      });
      return true;
    } catch (err) {
      this.absorb("refresh_buffer", err);
      return false;
    }
  }

  async sendMessage(text: string): Promise<boolean> {
    try {
      return await this.exec("send_message", SEND_MESSAGE_LUA, [text], z.boolean());
    } catch (err) {
      this.absorb("send_message", err);
      return false;
    }
  }

  async getVisualSelection(): Promise<SelectionContext | null> {
    try {
      const result = await this.exec("get_visual_selection", VISUAL_SELECTION_LUA, [], selectionSchema);
      if (!result || result.content.length === 0) return null;
      return {
        filePath: result.file_path,
        startLine: result.start_line,
        endLine: result.end_line,
        content: result.content,
      };
    } catch (err) {
      this.absorb("get_visual_selection", err);
      return null;
    }
  }

  private async exec<S extends z.ZodTypeAny>(
    operation: string,
    code: string,
    args: unknown[],
    schema: S,
  ): Promise<z.output<S>> {
    const raw = await this.client.execLua(code, args);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new RpcProtocolError(`Unexpected ${operation} result from Neovim`, { cause: parsed.error });
    }
    return parsed.data;
  }

  private absorb(operation: string, err: unknown): void {
    this.logger.debug?.("Neovim call failed, using neutral default", {
      operation,
      socket: this.instance.socketPath,
      error: err,
    });
  }
}
