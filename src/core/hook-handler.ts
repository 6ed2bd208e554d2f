/**
 * HookHandler: turns one decoded hook event into a HookResult, consulting
 * every editor instance scoped to the event's working directory.
 *
 * - PreToolUse on a modification: deny when any instance has the target as
 *   its current buffer with unsaved changes.
 * - PostToolUse on a modification: reload the target everywhere.
 * - UserPromptSubmit: attach the editor selection as additional context.
 *
 * Handlers hold no state between invocations; instances are rediscovered
 * on every call.
 */

import { resolve } from "node:path";
import type { Logger } from "../interfaces/logger.js";
import { EDITOR_DISPLAY_NAMES, type EditorInstance, type SelectionContext } from "../types/editor.js";
import {
  type HookInput,
  type HookResult,
  isModification,
  type PostToolUseEvent,
  type PreToolUseEvent,
  targetPaths,
  type UserPromptSubmitEvent,
} from "../types/hook.js";
import { assertNever } from "../utils/assert-never.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { FanOut } from "./fan-out.js";
import { SideEffects } from "./side-effects.js";

export const DENY_NOTIFICATION = "Claude tried to edit this file";

export type DiscoverFn = (cwd: string) => Promise<EditorInstance[]>;

export interface HookHandlerDeps {
  discover: DiscoverFn;
  fanOut: FanOut;
  notifyOnDeny: boolean;
  logger?: Logger;
}

export function denyReason(filePath: string, editor: string): string {
  return `The file ${filePath} is being edited by the user in ${editor}, try again later`;
}

export function formatSelection(selection: SelectionContext): string {
  return (
    `[Selected from ${selection.filePath}:${selection.startLine}-${selection.endLine}]\n` +
    "```\n" +
    `${selection.content}\n` +
    "```"
  );
}

export class HookHandler {
  private readonly discover: DiscoverFn;
  private readonly fanOut: FanOut;
  private readonly notifyOnDeny: boolean;
  private readonly logger: Logger;

  constructor(deps: HookHandlerDeps) {
    this.discover = deps.discover;
    this.fanOut = deps.fanOut;
    this.notifyOnDeny = deps.notifyOnDeny;
    this.logger = deps.logger ?? noopLogger;
  }

  /**
   * Decide the response for `input`. Refreshes and notifications are
   * registered on `effects` and not awaited here.
   */
  async handle(input: HookInput, effects: SideEffects = new SideEffects(this.logger)): Promise<HookResult> {
    switch (input.event) {
      case "PreToolUse":
        return this.preToolUse(input, effects);
      case "PostToolUse":
        return this.postToolUse(input, effects);
      case "UserPromptSubmit":
        return this.userPromptSubmit(input);
      case "Unhandled":
        this.logger.debug?.("Ignoring hook event", { event: input.eventName });
        return { event: "Unhandled" };
      default:
        return assertNever(input);
    }
  }

  private async preToolUse(input: PreToolUseEvent, effects: SideEffects): Promise<HookResult> {
    const call = input.toolCall;
    if (!isModification(call)) {
      return { event: "PreToolUse", permission: { decision: "allow" } };
    }

    const instances = await this.discover(input.cwd);
    if (instances.length === 0) {
      return { event: "PreToolUse", permission: { decision: "allow" } };
    }

    for (const target of targetPaths(call)) {
      const filePath = resolve(input.cwd, target);
      const aggregated = await this.fanOut.bufferStatus(instances, filePath);
      if (!aggregated.blocked) continue;

      const editor = aggregated.blockingKind ? EDITOR_DISPLAY_NAMES[aggregated.blockingKind] : "an editor";
      this.logger.info("Denied edit of file with unsaved changes", {
        filePath,
        tool: call.tool,
        socket: aggregated.blockingInstance?.socketPath,
      });
      if (this.notifyOnDeny) {
        effects.track("send_message", this.fanOut.sendMessage(instances, DENY_NOTIFICATION).done);
      }
      return {
        event: "PreToolUse",
        permission: { decision: "deny", reason: denyReason(filePath, editor) },
      };
    }

    return { event: "PreToolUse", permission: { decision: "allow" } };
  }

  private async postToolUse(input: PostToolUseEvent, effects: SideEffects): Promise<HookResult> {
    const call = input.toolCall;
    if (!isModification(call)) return { event: "PostToolUse" };

    const instances = await this.discover(input.cwd);
    for (const target of targetPaths(call)) {
      const filePath = resolve(input.cwd, target);
      effects.track("refresh_buffer", this.fanOut.refreshBuffer(instances, filePath).done);
    }
    return { event: "PostToolUse" };
  }

  private async userPromptSubmit(input: UserPromptSubmitEvent): Promise<HookResult> {
    const instances = await this.discover(input.cwd);
    const selection = await this.fanOut.visualSelection(instances);
    if (!selection) return { event: "UserPromptSubmit" };
    return { event: "UserPromptSubmit", additionalContext: formatSelection(selection) };
  }
}
