import type { JsonObject, ToolSchema } from "../mcp/types.js";

export type TextBlock = { type: "text"; text: string };

export type ToolUseBlock = { type: "tool_use"; id: string; name: string; input: JsonObject };

export type ToolResultBlock = {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
};

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/** Blocks a model can produce. */
export type OutputBlock = TextBlock | ToolUseBlock;

export type ConversationMessage =
  | { role: "user"; content: string | Array<TextBlock | ToolResultBlock> }
  | { role: "assistant"; content: string | OutputBlock[] };

export interface MessageRequest {
  model: string;
  max_tokens: number;
  system?: string;
  messages: ConversationMessage[];
  tools: ToolSchema[];
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface MessageResponse {
  content: OutputBlock[];
  stop_reason?: string | null;
  usage?: TokenUsage;
}

export interface ModelClient {
  createMessage(request: MessageRequest): Promise<MessageResponse>;
}

export function usageOf(input: number | undefined, output: number | undefined): TokenUsage {
  const input_tokens = input ?? 0;
  const output_tokens = output ?? 0;
  return { input_tokens, output_tokens, total_tokens: input_tokens + output_tokens };
}
