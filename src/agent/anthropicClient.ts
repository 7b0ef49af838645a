import Anthropic from "@anthropic-ai/sdk";

import { Env } from "../env.js";
import { isJsonObject } from "../mcp/types.js";
import { usageOf, type MessageRequest, type MessageResponse, type ModelClient, type OutputBlock } from "./model.js";

let cachedClient: Anthropic | null = null;

export function getAnthropicClient(): Anthropic {
  if (cachedClient) {
    return cachedClient;
  }

  const apiKey = Env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error("ANTHROPIC_API_KEY is not set. Export it or add it to .env before running a task.");
  }

  cachedClient = new Anthropic({ apiKey });
  return cachedClient;
}

export function fromAnthropicContent(blocks: Anthropic.Messages.ContentBlock[]): OutputBlock[] {
  const out: OutputBlock[] = [];
  for (const block of blocks) {
    if (block.type === "text") {
      out.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      out.push({
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: isJsonObject(block.input) ? block.input : {},
      });
    }
    // thinking blocks carry no answer text and no tool calls
  }
  return out;
}

export class AnthropicModelClient implements ModelClient {
  constructor(private readonly client: Anthropic = getAnthropicClient()) {}

  async createMessage(request: MessageRequest): Promise<MessageResponse> {
    try {
      const response = await this.client.messages.create({
        model: request.model,
        max_tokens: request.max_tokens,
        system: request.system,
        messages: request.messages,
        tools: request.tools,
      });

      return {
        content: fromAnthropicContent(response.content),
        stop_reason: response.stop_reason,
        usage: usageOf(response.usage.input_tokens, response.usage.output_tokens),
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        if (error.status === 401) {
          throw new Error("Anthropic API authentication failed. Check that your ANTHROPIC_API_KEY is valid.", {
            cause: error,
          });
        }
        if (error.status === 429) {
          throw new Error("Anthropic API rate limit exceeded. Please wait a moment before trying again.", {
            cause: error,
          });
        }
      }
      throw error;
    }
  }
}
