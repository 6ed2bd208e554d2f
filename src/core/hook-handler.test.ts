import { describe, expect, it, vi } from "vitest";
import type { EditorInstance } from "../types/editor.js";
import type { HookInput, ToolCall } from "../types/hook.js";
import { StubEditorFleet } from "../testing/stub-editor-action.js";
import { FanOut } from "./fan-out.js";
import { DENY_NOTIFICATION, HookHandler, denyReason, formatSelection } from "./hook-handler.js";
import { SideEffects } from "./side-effects.js";

const CWD = "/work/project";
const MAIN = "/work/project/src/main.rs";

const envelope = { sessionId: "test-session", transcriptPath: "/tmp/t.jsonl", cwd: CWD };

function pre(toolCall: ToolCall): HookInput {
  return { ...envelope, event: "PreToolUse", toolCall };
}

function post(toolCall: ToolCall): HookInput {
  return { ...envelope, event: "PostToolUse", toolCall };
}

function nvim(name: string): EditorInstance {
  return { kind: "neovim", socketPath: `/tmp/${name}.sock` };
}

function setup(fleet: StubEditorFleet, notifyOnDeny = true) {
  const discover = vi.fn(async (_cwd: string) => fleet.instances);
  const fanOut = new FanOut({ createAction: fleet.factory, timeoutMs: 200 });
  const handler = new HookHandler({ discover, fanOut, notifyOnDeny });
  return { handler, discover };
}

const editMain: ToolCall = { tool: "Edit", filePath: "src/main.rs", oldString: "a", newString: "b" };

describe("HookHandler PreToolUse", () => {
  it("denies an edit of the current unsaved buffer and notifies every instance", async () => {
    const fleet = new StubEditorFleet();
    const a = fleet.add(nvim("a"), { documents: [{ path: MAIN, modified: true }], current: MAIN });
    const b = fleet.add({ kind: "vscode", socketPath: "/tmp/b.sock" }, { documents: [{ path: MAIN }] });
    const { handler, discover } = setup(fleet);
    const effects = new SideEffects();

    const result = await handler.handle(pre(editMain), effects);

    expect(result).toEqual({
      event: "PreToolUse",
      permission: {
        decision: "deny",
        reason: "The file /work/project/src/main.rs is being edited by the user in Neovim, try again later",
      },
    });
    expect(discover).toHaveBeenCalledWith(CWD);

    await effects.settled(1000);
    expect(a.state.messages).toEqual([DENY_NOTIFICATION]);
    expect(b.state.messages).toEqual([DENY_NOTIFICATION]);
  });

  it("names the backend that blocked", () => {
    expect(denyReason("/x/y.ts", "VS Code")).toBe(
      "The file /x/y.ts is being edited by the user in VS Code, try again later",
    );
  });

  it("skips the notification when disabled", async () => {
    const fleet = new StubEditorFleet();
    const a = fleet.add(nvim("a"), { documents: [{ path: MAIN, modified: true }], current: MAIN });
    const { handler } = setup(fleet, false);
    const effects = new SideEffects();

    const result = await handler.handle(pre({ tool: "Write", filePath: MAIN, content: "" }), effects);

    expect(result).toMatchObject({ permission: { decision: "deny" } });
    expect(effects.size).toBe(0);
    expect(a.state.calls).toEqual(["buffer_status"]);
  });

  it("allows when the file is saved everywhere", async () => {
    const fleet = new StubEditorFleet();
    fleet.add(nvim("a"), { documents: [{ path: MAIN }], current: MAIN });
    const { handler } = setup(fleet);

    expect(await handler.handle(pre(editMain))).toEqual({
      event: "PreToolUse",
      permission: { decision: "allow" },
    });
  });

  it("allows when unsaved but not current", async () => {
    const fleet = new StubEditorFleet();
    fleet.add(nvim("a"), { documents: [{ path: MAIN, modified: true }], current: "/work/project/other" });
    const { handler } = setup(fleet);

    const result = await handler.handle(pre({ tool: "MultiEdit", filePath: MAIN, edits: [] }));
    expect(result).toEqual({ event: "PreToolUse", permission: { decision: "allow" } });
  });

  it("allows with no editors running", async () => {
    const fleet = new StubEditorFleet();
    const { handler, discover } = setup(fleet);

    expect(await handler.handle(pre(editMain))).toEqual({
      event: "PreToolUse",
      permission: { decision: "allow" },
    });
    expect(discover).toHaveBeenCalledTimes(1);
    expect(fleet.created).toBe(0);
  });

  it("allows reads without discovery", async () => {
    const fleet = new StubEditorFleet();
    fleet.add(nvim("a"), { documents: [{ path: MAIN, modified: true }], current: MAIN });
    const { handler, discover } = setup(fleet);

    const result = await handler.handle(pre({ tool: "Read", filePath: MAIN }));

    expect(result).toEqual({ event: "PreToolUse", permission: { decision: "allow" } });
    expect(discover).not.toHaveBeenCalled();
    expect(fleet.totalCalls).toBe(0);
  });
});

describe("HookHandler PostToolUse", () => {
  it("refreshes the modified file in every instance", async () => {
    const fleet = new StubEditorFleet();
    const a = fleet.add(nvim("a"), { documents: [{ path: MAIN, modified: true }], current: MAIN });
    const b = fleet.add(nvim("b"), { documents: [{ path: MAIN }] });
    const { handler } = setup(fleet);
    const effects = new SideEffects();

    expect(await handler.handle(post(editMain), effects)).toEqual({ event: "PostToolUse" });
    await expect(effects.settled(1000)).resolves.toEqual({ total: 1, abandoned: 0 });

    expect(a.state.refreshed).toEqual([MAIN]);
    expect(b.state.refreshed).toEqual([MAIN]);
  });

  it("does nothing for non-modifications", async () => {
    const fleet = new StubEditorFleet();
    fleet.add(nvim("a"));
    const { handler, discover } = setup(fleet);
    const effects = new SideEffects();

    await handler.handle(post({ tool: "Bash", command: "ls" }), effects);

    expect(discover).not.toHaveBeenCalled();
    expect(effects.size).toBe(0);
  });
});

describe("HookHandler UserPromptSubmit", () => {
  const prompt: HookInput = { ...envelope, event: "UserPromptSubmit", prompt: "explain this" };

  it("attaches the selection as context", async () => {
    const fleet = new StubEditorFleet();
    fleet.add(nvim("a"), {
      selection: { filePath: MAIN, startLine: 2, endLine: 3, content: "let x = 1;\nlet y = 2;" },
    });
    const { handler } = setup(fleet);

    expect(await handler.handle(prompt)).toEqual({
      event: "UserPromptSubmit",
      additionalContext:
        "[Selected from /work/project/src/main.rs:2-3]\n```\nlet x = 1;\nlet y = 2;\n```",
    });
  });

  it("is a no-op without a selection", async () => {
    const fleet = new StubEditorFleet();
    fleet.add(nvim("a"));
    const { handler } = setup(fleet);

    expect(await handler.handle(prompt)).toEqual({ event: "UserPromptSubmit" });
  });

  it("formats single-line selections", () => {
    expect(formatSelection({ filePath: "/a.ts", startLine: 7, endLine: 7, content: "x" })).toBe(
      "[Selected from /a.ts:7-7]\n```\nx\n```",
    );
  });
});

describe("HookHandler other events", () => {
  it("ignores events it does not handle", async () => {
    const fleet = new StubEditorFleet();
    const { handler, discover } = setup(fleet);

    const result = await handler.handle({ ...envelope, event: "Unhandled", eventName: "Stop" });

    expect(result).toEqual({ event: "Unhandled" });
    expect(discover).not.toHaveBeenCalled();
  });
});
