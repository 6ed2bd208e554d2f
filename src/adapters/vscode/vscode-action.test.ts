import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FakeEditorOptions } from "../../testing/fake-editor-state.js";
import { FakeVSCodeServer } from "../../testing/fake-vscode-server.js";
import { makeSocketDir, removeSocketDir } from "../../testing/socket-dir.js";
import { VSCodeAction } from "./vscode-action.js";

const FILE = "/bg-missing-root/src/main.ts";
const OTHER = "/bg-missing-root/src/other.ts";

describe("VSCodeAction", () => {
  let dir: string;
  let server: FakeVSCodeServer | undefined;

  beforeEach(async () => {
    dir = await makeSocketDir();
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    await removeSocketDir(dir);
  });

  async function connect(options: FakeEditorOptions, timeoutMs = 1000) {
    const socketPath = join(dir, "code.sock");
    server = await new FakeVSCodeServer(socketPath, options).start();
    const action = new VSCodeAction({ kind: "vscode", socketPath }, { timeoutMs });
    return { action, state: server.state };
  }

  it("reports the active dirty document", async () => {
    const { action, state } = await connect({
      documents: [{ path: FILE, modified: true }],
      current: FILE,
    });

    expect(await action.bufferStatus(FILE)).toEqual({ isCurrent: true, hasUnsavedChanges: true });
    expect(state.calls).toEqual(["buffer_status"]);
  });

  it("reports a saved active document as non-blocking", async () => {
    const { action } = await connect({ documents: [{ path: FILE }], current: FILE });

    expect(await action.bufferStatus(FILE)).toEqual({ isCurrent: true, hasUnsavedChanges: false });
  });

  it("reports an unopened file as clean", async () => {
    const { action } = await connect({ documents: [{ path: OTHER, modified: true }], current: OTHER });

    expect(await action.bufferStatus(FILE)).toEqual({ isCurrent: false, hasUnsavedChanges: false });
  });

  it("refreshes open documents", async () => {
    const { action, state } = await connect({ documents: [{ path: FILE }] });

    expect(await action.refreshBuffer(FILE)).toBe(true);
    expect(await action.refreshBuffer(OTHER)).toBe(true);
    expect(state.refreshed).toEqual([FILE]);
  });

  it("sends notifications", async () => {
    const { action, state } = await connect({});

    expect(await action.sendMessage("Claude tried to edit this file")).toBe(true);
    expect(state.messages).toEqual(["Claude tried to edit this file"]);
  });

  it("returns the selection and maps empty content to null", async () => {
    const selection = { filePath: FILE, startLine: 10, endLine: 12, content: "const x = 1;" };
    const { action, state } = await connect({ selection });

    expect(await action.getVisualSelection()).toEqual(selection);

    state.selection = { ...selection, content: "" };
    expect(await action.getVisualSelection()).toBeNull();

    state.selection = null;
    expect(await action.getVisualSelection()).toBeNull();
  });

  describe("failure absorption", () => {
    it("falls back to neutral defaults when nothing listens", async () => {
      const action = new VSCodeAction(
        { kind: "vscode", socketPath: join(dir, "gone.sock") },
        { timeoutMs: 1000 },
      );

      expect(await action.bufferStatus(FILE)).toEqual({ isCurrent: false, hasUnsavedChanges: false });
      expect(await action.refreshBuffer(FILE)).toBe(false);
      expect(await action.sendMessage("hi")).toBe(false);
      expect(await action.getVisualSelection()).toBeNull();
    });

    it("times out a silent extension", async () => {
      const { action } = await connect(
        { documents: [{ path: FILE, modified: true }], current: FILE, silent: true },
        100,
      );

      const started = Date.now();
      expect(await action.bufferStatus(FILE)).toEqual({ isCurrent: false, hasUnsavedChanges: false });
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it("treats unparseable responses as failures", async () => {
      const { action } = await connect({
        documents: [{ path: FILE, modified: true }],
        current: FILE,
        malformed: true,
      });

      expect(await action.bufferStatus(FILE)).toEqual({ isCurrent: false, hasUnsavedChanges: false });
    });
  });
});
