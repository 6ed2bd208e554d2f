import type { EditorAction, EditorActionOptions } from "../../core/interfaces/editor-action.js";
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
  bufferStatusResultSchema,
  selectionResultSchema,
  successResultSchema,
  VSCodeRpcClient,
} from "./vscode-rpc.js";

export interface VSCodeActionOptions extends EditorActionOptions {
  logger?: Logger;
}

/** EditorAction over the VS Code extension's NDJSON socket. */
export class VSCodeAction implements EditorAction {
  readonly kind = "vscode" as const;
  private readonly client: VSCodeRpcClient;
  private readonly logger: Logger;
  private readonly cwd: string | undefined;

  constructor(
    readonly instance: EditorInstance,
    options: VSCodeActionOptions,
  ) {
    this.client = new VSCodeRpcClient({ socketPath: instance.socketPath, timeoutMs: options.timeoutMs });
    this.logger = options.logger ?? noopLogger;
    this.cwd = options.cwd;
  }

  async bufferStatus(path: string): Promise<BufferStatus> {
    const filePath = await canonicalPath(path, this.cwd);
    try {
      const result = await this.client.call(
        "buffer_status",
        { file_path: filePath },
        bufferStatusResultSchema,
      );
      return { isCurrent: result.is_current, hasUnsavedChanges: result.has_unsaved_changes };
    } catch (err) {
      this.absorb("buffer_status", err);
      return { ...CLEAN_BUFFER };
    }
  }

  async refreshBuffer(path: string): Promise<boolean> {
    const filePath = await canonicalPath(path, this.cwd);
    try {
      const result = await this.client.call(
        "refresh_buffer",
        { file_path: filePath },
        successResultSchema,
      );
      return result.success;
    } catch (err) {
      this.absorb("refresh_buffer", err);
      return false;
    }
  }

  async sendMessage(text: string): Promise<boolean> {
    try {
      const result = await this.client.call("send_message", { message: text }, successResultSchema);
      return result.success;
    } catch (err) {
      this.absorb("send_message", err);
      return false;
    }
  }

  async getVisualSelection(): Promise<SelectionContext | null> {
    try {
      const result = await this.client.call("get_visual_selection", undefined, selectionResultSchema);
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

  private absorb(operation: string, err: unknown): void {
    this.logger.debug?.("VS Code call failed, using neutral default", {
      operation,
      socket: this.instance.socketPath,
      error: err,
    });
  }
}
