/**
 * Hook protocol model: decoded tool calls, hook events and the decisions the
 * handler renders.
 * @module
 */

import { assertNever } from "../utils/assert-never.js";
import type { EditorInstance, EditorKind } from "./editor.js";

// ── Tool calls ──────────────────────────────────────────────────────────────

export interface ReadToolCall {
  tool: "Read";
  filePath: string;
}

export interface WriteToolCall {
  tool: "Write";
  filePath: string;
  content: string;
}

export interface EditToolCall {
  tool: "Edit";
  filePath: string;
  oldString: string;
  newString: string;
  replaceAll?: boolean;
}

export interface MultiEditToolCall {
  tool: "MultiEdit";
  filePath: string;
  edits: Array<{ oldString: string; newString: string; replaceAll?: boolean }>;
}

export interface BashToolCall {
  tool: "Bash";
  command: string;
  description?: string;
}

/** Any tool the handler has no specific model for (Glob, Grep, WebFetch, ...). */
export interface OtherToolCall {
  tool: "Other";
  toolName: string;
  input: Record<string, unknown>;
}

export type ToolCall =
  | ReadToolCall
  | WriteToolCall
  | EditToolCall
  | MultiEditToolCall
  | BashToolCall
  | OtherToolCall;

export type ModificationToolCall = WriteToolCall | EditToolCall | MultiEditToolCall;

export function isModification(call: ToolCall): call is ModificationToolCall {
  switch (call.tool) {
    case "Write":
    case "Edit":
    case "MultiEdit":
      return true;
    case "Read":
    case "Bash":
    case "Other":
      return false;
    default:
      return assertNever(call);
  }
}

/** Target paths of a modification, as given by the tool (not yet resolved). */
export function targetPaths(call: ModificationToolCall): string[] {
  return [call.filePath];
}

// ── Hook events ─────────────────────────────────────────────────────────────

interface HookEnvelope {
  sessionId: string;
  transcriptPath: string;
  cwd: string;
}

export interface PreToolUseEvent extends HookEnvelope {
  event: "PreToolUse";
  toolCall: ToolCall;
}

export interface PostToolUseEvent extends HookEnvelope {
  event: "PostToolUse";
  toolCall: ToolCall;
}

export interface UserPromptSubmitEvent extends HookEnvelope {
  event: "UserPromptSubmit";
  prompt: string;
}

/** Event names the handler does not act on (SessionStart, Stop, ...). */
export interface UnhandledHookEvent extends HookEnvelope {
  event: "Unhandled";
  eventName: string;
}

export type HookInput =
  | PreToolUseEvent
  | PostToolUseEvent
  | UserPromptSubmitEvent
  | UnhandledHookEvent;

// ── Decisions ───────────────────────────────────────────────────────────────

export type Decision = "allow" | "deny" | "ask";

export interface PermissionDecision {
  decision: Decision;
  reason?: string;
}

export interface AggregatedDecision {
  blocked: boolean;
  blockingKind?: EditorKind;
  blockingInstance?: EditorInstance;
}

/** What the handler hands back to the transport layer for rendering. */
export type HookResult =
  | { event: "PreToolUse"; permission: PermissionDecision }
  | { event: "UserPromptSubmit"; additionalContext?: string }
  | { event: "PostToolUse" }
  | { event: "Unhandled" };
