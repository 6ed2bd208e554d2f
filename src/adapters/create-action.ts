import type {
  EditorAction,
  EditorActionFactory,
} from "../core/interfaces/editor-action.js";
import type { Logger } from "../interfaces/logger.js";
import type { EditorInstance } from "../types/editor.js";
import { assertNever } from "../utils/assert-never.js";
import { NeovimAction } from "./neovim/neovim-action.js";
import { VSCodeAction } from "./vscode/vscode-action.js";

export interface CreateActionDeps {
  timeoutMs: number;
  cwd?: string;
  logger?: Logger;
}

/** Pick the adapter for an instance by its kind tag. */
export function createEditorAction(instance: EditorInstance, deps: CreateActionDeps): EditorAction {
  const options = { timeoutMs: deps.timeoutMs, cwd: deps.cwd, logger: deps.logger };
  switch (instance.kind) {
    case "neovim":
      return new NeovimAction(instance, options);
    case "vscode":
      return new VSCodeAction(instance, options);
    default:
      return assertNever(instance.kind);
  }
}

export function editorActionFactory(deps: CreateActionDeps): EditorActionFactory {
  return (instance) => createEditorAction(instance, deps);
}
