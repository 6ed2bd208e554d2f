/**
 * The capability every editor backend exposes to the fan-out layer.
 * @module
 */

import type {
  BufferStatus,
  EditorInstance,
  EditorKind,
  SelectionContext,
} from "../../types/editor.js";

/**
 * Operations against one editor instance. Each call opens its own connection,
 * is bounded by the RPC timeout, and never rejects: connection, timeout and
 * protocol failures resolve to the operation's neutral default.
 */
export interface EditorAction {
  readonly kind: EditorKind;
  readonly instance: EditorInstance;

  /** `{ isCurrent: false, hasUnsavedChanges: false }` when the file is not open. */
  bufferStatus(path: string): Promise<BufferStatus>;

  /** Reload every view of the file from disk. True when the file is not open. */
  refreshBuffer(path: string): Promise<boolean>;

  /** Show a warning notification in the editor. */
  sendMessage(text: string): Promise<boolean>;

  /** The active, non-empty selection, if any. */
  getVisualSelection(): Promise<SelectionContext | null>;
}

export interface EditorActionOptions {
  timeoutMs: number;
  /** Resolves relative target paths before canonicalization. */
  cwd?: string;
}

export type EditorActionFactory = (instance: EditorInstance) => EditorAction;
