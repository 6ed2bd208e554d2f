/**
 * Hook response rendering.
 *
 * `allow` renders as `{}`: the hook raises no objection and the assistant's
 * own permission flow stays in charge. An explicit `"allow"` would skip the
 * user's permission prompt, which is not this hook's call to make.
 */

import type { HookResult } from "../types/hook.js";

export interface HookOutput {
  hookSpecificOutput?: {
    hookEventName: "PreToolUse" | "UserPromptSubmit";
    permissionDecision?: "deny" | "ask";
    permissionDecisionReason?: string;
    additionalContext?: string;
  };
}

export function renderHookOutput(result: HookResult): HookOutput {
  switch (result.event) {
    case "PreToolUse": {
      const { decision, reason } = result.permission;
      if (decision === "allow") return {};
      return {
        hookSpecificOutput: {
          hookEventName: "PreToolUse",
          permissionDecision: decision,
          ...(reason !== undefined && { permissionDecisionReason: reason }),
        },
      };
    }
    case "UserPromptSubmit":
      if (result.additionalContext === undefined) return {};
      return {
        hookSpecificOutput: {
          hookEventName: "UserPromptSubmit",
          additionalContext: result.additionalContext,
        },
      };
    case "PostToolUse":
    case "Unhandled":
      return {};
  }
}

export function serializeHookOutput(result: HookResult): string {
  return JSON.stringify(renderHookOutput(result));
}
