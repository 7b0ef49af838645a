// src/agent/tools/result.ts
import type { ToolResultBlock, ToolUseBlock } from "../model.js";

/** Outcome of one tool invocation, consumed uniformly by the loop. */
export type ToolOutcome = { ok: true; output: string } | { ok: false; error: string };

/**
 * Normalize a tool's return value to the string the model sees.
 * Tool servers return plain text most of the time, but the first content
 * element may be an arbitrary object (images, resources).
 */
export function toolResultToString(raw: unknown): string {
  if (raw == null) return "";
  if (typeof raw === "string") return raw;

  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    // circular or BigInt
    return String(raw);
  }
}

export function toToolResultBlock(call: ToolUseBlock, outcome: ToolOutcome): ToolResultBlock {
  if (outcome.ok) {
    return { type: "tool_result", tool_use_id: call.id, content: outcome.output };
  }
  return { type: "tool_result", tool_use_id: call.id, content: `Error: ${outcome.error}`, is_error: true };
}
