// src/agent/run.ts
import { DEBUG } from "../env.js";
import { ToolPairingError } from "../mcp/errors.js";
import type { ToolSchema } from "../mcp/types.js";
import type {
  ConversationMessage,
  MessageResponse,
  ModelClient,
  ToolResultBlock,
  ToolUseBlock,
} from "./model.js";
import { invokeTool, type ToolExecutor } from "./tools/invoke.js";
import { toToolResultBlock } from "./tools/result.js";

export const DEFAULT_MAX_ITERATIONS = 30;
export const DEFAULT_MAX_TOKENS = 2048;

export type LoopState = "awaiting_model" | "model_responded" | "executing_tools" | "done" | "max_iterations";

export type ConversationStatus = Extract<LoopState, "done" | "max_iterations">;

export type RunConversationOptions = {
  model: ModelClient;
  modelName: string;
  tools: ToolExecutor;
  toolSchemas: ToolSchema[];
  task: string;
  system?: string;
  maxTokens?: number;
  maxIterations?: number;
  onState?: (state: LoopState, iteration: number) => void;
};

export type ConversationResult = {
  status: ConversationStatus;
  /** Text of the last model turn (may be empty). */
  text: string;
  iterations: number;
  messages: ConversationMessage[];
};

type Turn = { text: string; calls: ToolUseBlock[] };

function splitTurn(response: MessageResponse): Turn {
  let text = "";
  const calls: ToolUseBlock[] = [];
  for (const block of response.content) {
    switch (block.type) {
      case "text":
        text += block.text;
        break;
      case "tool_use":
        calls.push(block);
        break;
    }
  }
  return { text, calls };
}

/**
 * Pair results with invocations by id: every call of the turn gets exactly
 * one result, in the order the model emitted the calls. Calls sharing an id
 * (local models reuse them) are answered by position.
 */
export function pairToolResults(calls: ToolUseBlock[], results: ToolResultBlock[]): ToolResultBlock[] {
  const byId = new Map<string, ToolResultBlock[]>();
  for (const r of results) {
    const queue = byId.get(r.tool_use_id);
    if (queue) queue.push(r);
    else byId.set(r.tool_use_id, [r]);
  }

  const paired = calls.map((call) => {
    const r = byId.get(call.id)?.shift();
    if (!r) throw new ToolPairingError(`Tool call ${call.id} (${call.name}) has no result`);
    return r;
  });
  if (paired.length !== results.length) throw new ToolPairingError("Tool results reference unknown tool calls");
  return paired;
}

/**
 * Drive the model until it answers without tool calls, or until
 * `maxIterations` model turns have run.
 *
 * Tools of one turn execute sequentially in emitted order, so later calls see
 * the side effects of earlier ones.
 */
export async function runConversation(opts: RunConversationOptions): Promise<ConversationResult> {
  const maxIterations = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const messages: ConversationMessage[] = [{ role: "user", content: opts.task }];

  let text = "";
  let iteration = 0;

  const enter = (state: LoopState) => {
    if (DEBUG) console.log(`[agent] ${state} (iteration ${iteration})`);
    opts.onState?.(state, iteration);
  };

  while (iteration < maxIterations) {
    iteration += 1;
    enter("awaiting_model");

    const response = await opts.model.createMessage({
      model: opts.modelName,
      max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
      system: opts.system,
      messages: [...messages],
      tools: opts.toolSchemas,
    });
    enter("model_responded");

    const turn = splitTurn(response);
    text = turn.text;
    messages.push({ role: "assistant", content: response.content });

    if (turn.calls.length === 0) {
      enter("done");
      return { status: "done", text, iterations: iteration, messages };
    }

    enter("executing_tools");
    const results: ToolResultBlock[] = [];
    for (const call of turn.calls) {
      if (DEBUG) console.log(`[agent] executing ${call.name}`);
      const outcome = await invokeTool(opts.tools, call);
      results.push(toToolResultBlock(call, outcome));
    }
    messages.push({ role: "user", content: pairToolResults(turn.calls, results) });
  }

  console.warn(`[agent] reached max iterations (${maxIterations})`);
  enter("max_iterations");
  return { status: "max_iterations", text, iterations: iteration, messages };
}
