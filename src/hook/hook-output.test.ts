import { describe, expect, it } from "vitest";
import { renderHookOutput, serializeHookOutput } from "./hook-output.js";

describe("renderHookOutput", () => {
  it("renders allow as an empty object", () => {
    expect(serializeHookOutput({ event: "PreToolUse", permission: { decision: "allow" } })).toBe(
      "{}",
    );
  });

  it("renders deny with its reason", () => {
    const json = serializeHookOutput({
      event: "PreToolUse",
      permission: { decision: "deny", reason: "src/main.rs has unsaved changes" },
    });
    expect(json).toBe(
      '{"hookSpecificOutput":{"hookEventName":"PreToolUse","permissionDecision":"deny","permissionDecisionReason":"src/main.rs has unsaved changes"}}',
    );
  });

  it("renders ask without a reason when none is given", () => {
    expect(renderHookOutput({ event: "PreToolUse", permission: { decision: "ask" } })).toEqual({
      hookSpecificOutput: { hookEventName: "PreToolUse", permissionDecision: "ask" },
    });
  });

  it("renders selection context as additionalContext", () => {
    expect(
      renderHookOutput({ event: "UserPromptSubmit", additionalContext: "[Selected from a.ts:1-2]" }),
    ).toEqual({
      hookSpecificOutput: {
        hookEventName: "UserPromptSubmit",
        additionalContext: "[Selected from a.ts:1-2]",
      },
    });
  });

  it("renders prompt events without a selection as empty", () => {
    expect(renderHookOutput({ event: "UserPromptSubmit" })).toEqual({});
  });

  it("renders post-tool and unhandled events as empty", () => {
    expect(renderHookOutput({ event: "PostToolUse" })).toEqual({});
    expect(renderHookOutput({ event: "Unhandled" })).toEqual({});
  });
});
