import { z } from "zod";
import { TOOL_TARGET_FIELDS } from "../constants";
import type { HookPayload, ToolRequest } from "../types";

const HookPayloadSchema = z.object({
  tool_name: z.string().optional(),
  tool_input: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Parse the JSON document a PreToolUse hook receives on stdin.
 * Anything that is not a JSON object of the expected shape yields null.
 */
export function parseToolRequest(input: string): ToolRequest | null {
  let raw: unknown;
  try {
    raw = JSON.parse(input);
  } catch {
    return null;
  }

  const parsed = HookPayloadSchema.safeParse(raw);
  if (!parsed.success) return null;

  const payload: HookPayload = parsed.data;
  return {
    toolName: payload.tool_name ?? "",
    toolInput: payload.tool_input ?? {},
  };
}

export function readStringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/** The text a tool call would touch, or "" for tools that are not inspected. */
export function extractTargetText(request: ToolRequest): string {
  const field = TOOL_TARGET_FIELDS.get(request.toolName);
  if (!field) return "";
  return readStringField(request.toolInput, field);
}
