import { z } from "zod";
import { HookPayloadError } from "../errors.js";
import type { HookInput, ToolCall } from "./hook.js";

const filePath = z.string().min(1);

export const hookEnvelopeSchema = z.object({
  session_id: z.string(),
  transcript_path: z.string(),
  cwd: z.string().min(1),
  hook_event_name: z.string().min(1),
});

export const toolEventSchema = z.object({
  tool_name: z.string().min(1),
  tool_input: z.record(z.unknown()),
});

export const promptEventSchema = z.object({
  prompt: z.string().default(""),
});

const editSchema = z.object({
  old_string: z.string().default(""),
  new_string: z.string().default(""),
  replace_all: z.boolean().optional(),
});

export const toolInputSchemas = {
  Read: z.object({ file_path: filePath }),
  Write: z.object({ file_path: filePath, content: z.string().default("") }),
  Edit: editSchema.extend({ file_path: filePath }),
  MultiEdit: z.object({ file_path: filePath, edits: z.array(editSchema).default([]) }),
  Bash: z.object({ command: z.string().default(""), description: z.string().optional() }),
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new HookPayloadError(`Invalid ${what}: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Decode a raw `tool_name` / `tool_input` pair into the tagged ToolCall union. */
export function decodeToolCall(toolName: string, input: Record<string, unknown>): ToolCall {
  const what = `tool_input for ${toolName}`;
  switch (toolName) {
    case "Read": {
      const parsed = parseOrThrow(toolInputSchemas.Read, input, what);
      return { tool: "Read", filePath: parsed.file_path };
    }
    case "Write": {
      const parsed = parseOrThrow(toolInputSchemas.Write, input, what);
      return { tool: "Write", filePath: parsed.file_path, content: parsed.content };
    }
    case "Edit": {
      const parsed = parseOrThrow(toolInputSchemas.Edit, input, what);
      return {
        tool: "Edit",
        filePath: parsed.file_path,
        oldString: parsed.old_string,
        newString: parsed.new_string,
        ...(parsed.replace_all !== undefined && { replaceAll: parsed.replace_all }),
      };
    }
    case "MultiEdit": {
      const parsed = parseOrThrow(toolInputSchemas.MultiEdit, input, what);
      return {
        tool: "MultiEdit",
        filePath: parsed.file_path,
        edits: parsed.edits.map((edit) => ({
          oldString: edit.old_string,
          newString: edit.new_string,
          ...(edit.replace_all !== undefined && { replaceAll: edit.replace_all }),
        })),
      };
    }
    case "Bash": {
      const parsed = parseOrThrow(toolInputSchemas.Bash, input, what);
      return {
        tool: "Bash",
        command: parsed.command,
        ...(parsed.description !== undefined && { description: parsed.description }),
      };
    }
    default:
      return { tool: "Other", toolName, input };
  }
}

/**
 * Decode one hook payload. Throws HookPayloadError on invalid JSON, missing
 * envelope fields, or invalid input for a modelled tool.
 */
export function decodeHookInput(raw: string): HookInput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new HookPayloadError("Hook payload is not valid JSON", { cause: err });
  }

  const envelope = parseOrThrow(hookEnvelopeSchema, json, "hook payload");
  const base = {
    sessionId: envelope.session_id,
    transcriptPath: envelope.transcript_path,
    cwd: envelope.cwd,
  };

  switch (envelope.hook_event_name) {
    case "PreToolUse":
    case "PostToolUse": {
      const tool = parseOrThrow(toolEventSchema, json, `${envelope.hook_event_name} payload`);
      return {
        ...base,
        event: envelope.hook_event_name,
        toolCall: decodeToolCall(tool.tool_name, tool.tool_input),
      };
    }
    case "UserPromptSubmit": {
      const prompt = parseOrThrow(promptEventSchema, json, "UserPromptSubmit payload");
      return { ...base, event: "UserPromptSubmit", prompt: prompt.prompt };
    }
    default:
      return { ...base, event: "Unhandled", eventName: envelope.hook_event_name };
  }
}
