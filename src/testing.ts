/**
 * Public test utilities, exported from the `"bufguard/testing"` entry point.
 * In-process editor stand-ins that speak the real socket protocols.
 */
export type { FakeEditorOptions } from "./testing/fake-editor-state.js";
export { FakeEditorState } from "./testing/fake-editor-state.js";
export { FakeNeovimServer } from "./testing/fake-neovim-server.js";
export { FakeVSCodeServer } from "./testing/fake-vscode-server.js";
export { makeSocketDir, removeSocketDir } from "./testing/socket-dir.js";
export type { StubEditorOptions } from "./testing/stub-editor-action.js";
export { StubEditorAction, StubEditorFleet } from "./testing/stub-editor-action.js";
