/**
 * Editor-side data model: instances, buffer state, selections.
 * @module
 */

export type EditorKind = "neovim" | "vscode";

export const EDITOR_KINDS: readonly EditorKind[] = ["neovim", "vscode"];

/** Human-readable backend name used in deny reasons and CLI output. */
export const EDITOR_DISPLAY_NAMES: Record<EditorKind, string> = {
  neovim: "Neovim",
  vscode: "VS Code",
};

/** One running editor reachable over one Unix-domain socket. Identity = socketPath. */
export interface EditorInstance {
  kind: EditorKind;
  socketPath: string;
  /** Owning process id parsed from the socket name, when it is numeric. */
  pid?: number;
}

export interface BufferStatus {
  isCurrent: boolean;
  hasUnsavedChanges: boolean;
}

export const CLEAN_BUFFER: Readonly<BufferStatus> = Object.freeze({
  isCurrent: false,
  hasUnsavedChanges: false,
});

/** Lines are 1-based and inclusive. */
export interface SelectionContext {
  filePath: string;
  startLine: number;
  endLine: number;
  content: string;
}

export function isBlocking(status: BufferStatus): boolean {
  return status.isCurrent && status.hasUnsavedChanges;
}

export function compareInstances(a: EditorInstance, b: EditorInstance): number {
  if (a.socketPath < b.socketPath) return -1;
  if (a.socketPath > b.socketPath) return 1;
  return 0;
}
