// src/agent/tools/invoke.ts
import { DEBUG } from "../../env.js";
import { isFatalTransportError, messageOf } from "../../mcp/errors.js";
import type { JsonObject } from "../../mcp/types.js";
import type { ToolUseBlock } from "../model.js";
import { toolResultToString, type ToolOutcome } from "./result.js";

export interface ToolExecutor {
  callTool(name: string, args: JsonObject): Promise<unknown>;
}

/**
 * Run one tool call. Tool-level failures come back as an error outcome so the
 * model can adapt; a dead or confused transport is rethrown.
 */
export async function invokeTool(executor: ToolExecutor, call: ToolUseBlock): Promise<ToolOutcome> {
  try {
    const raw = await executor.callTool(call.name, call.input);
    const output = toolResultToString(raw);
    if (DEBUG) console.log(`[agent] ${call.name} ->`, output.slice(0, 200));
    return { ok: true, output };
  } catch (e) {
    if (isFatalTransportError(e)) throw e;
    console.error(`[agent] tool ${call.name} failed:`, messageOf(e));
    return { ok: false, error: messageOf(e) };
  }
}
