import { randomUUID } from "node:crypto";
import { ChatOllama } from "@langchain/ollama";
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type BaseMessage,
} from "@langchain/core/messages";

import { Env } from "../env.js";
import { isJsonObject, type ToolSchema } from "../mcp/types.js";
import {
  usageOf,
  type ConversationMessage,
  type MessageRequest,
  type MessageResponse,
  type ModelClient,
  type OutputBlock,
  type ToolUseBlock,
} from "./model.js";

/** Text of a LangChain message content (string or list of parts). */
export function contentText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content
    .map((part: unknown) => (isJsonObject(part) && part.type === "text" && typeof part.text === "string" ? part.text : ""))
    .join("");
}

export function toLangChainMessages(system: string | undefined, messages: ConversationMessage[]): BaseMessage[] {
  const out: BaseMessage[] = [];
  if (system) out.push(new SystemMessage(system));

  for (const m of messages) {
    if (m.role === "assistant") {
      if (typeof m.content === "string") {
        out.push(new AIMessage(m.content));
        continue;
      }
      const text = m.content.map((b) => (b.type === "text" ? b.text : "")).join("");
      const tool_calls = m.content
        .filter((b): b is ToolUseBlock => b.type === "tool_use")
        .map((b) => ({ id: b.id, name: b.name, args: b.input }));
      out.push(new AIMessage({ content: text, tool_calls }));
      continue;
    }

    if (typeof m.content === "string") {
      out.push(new HumanMessage(m.content));
      continue;
    }
    for (const block of m.content) {
      switch (block.type) {
        case "text":
          out.push(new HumanMessage(block.text));
          break;
        case "tool_result":
          out.push(new ToolMessage({ content: block.content, tool_call_id: block.tool_use_id }));
          break;
      }
    }
  }

  return out;
}

export function fromAIMessage(ai: Pick<AIMessage, "content" | "tool_calls">): OutputBlock[] {
  const blocks: OutputBlock[] = [];
  const text = contentText(ai.content);
  if (text) blocks.push({ type: "text", text });

  for (const call of ai.tool_calls ?? []) {
    blocks.push({
      type: "tool_use",
      // Ollama does not always assign call ids; results are paired by id.
      id: call.id ?? `call_${randomUUID()}`,
      name: call.name,
      input: isJsonObject(call.args) ? call.args : {},
    });
  }
  return blocks;
}

function toToolDefinition(tool: ToolSchema) {
  return {
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  };
}

/** Local provider: the same conversation driven through a ChatOllama model. */
export class OllamaModelClient implements ModelClient {
  constructor(
    private readonly opts: { baseUrl: string; temperature?: number } = { baseUrl: Env.OLLAMA_URL },
  ) {}

  async createMessage(request: MessageRequest): Promise<MessageResponse> {
    const llm = new ChatOllama({
      baseUrl: this.opts.baseUrl,
      model: request.model,
      temperature: this.opts.temperature ?? 0.3,
      numPredict: request.max_tokens,
    }).bindTools(request.tools.map(toToolDefinition));

    const ai = await llm.invoke(toLangChainMessages(request.system, request.messages));
    const usage = ai.usage_metadata;

    return {
      content: fromAIMessage(ai),
      stop_reason: ai.tool_calls?.length ? "tool_use" : "end_turn",
      usage: usage ? usageOf(usage.input_tokens, usage.output_tokens) : undefined,
    };
  }
}
