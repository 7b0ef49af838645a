// src/agent/browse.ts
import { DEBUG, Env, parseCommandLine, toolServerCommand } from "../env.js";
import { messageOf } from "../mcp/errors.js";
import { withStdioMcpClient, type StdioMcpClientOptions } from "../mcp/stdioClient.js";
import type { McpClient } from "../mcp/types.js";
import type { ModelClient } from "./model.js";
import { createModelClient, getDefaultModel, type ModelProvider } from "./modelClient.js";
import { systemPrompt } from "./prompt.js";
import { runConversation, type ConversationResult, type LoopState } from "./run.js";

export type ToolServerOverrides = Partial<StdioMcpClientOptions> & {
  /** Replaces BROWSER_ARGS. */
  browserArgs?: string[];
};

export type BrowseOptions = ToolServerOverrides & {
  provider?: ModelProvider;
  model?: ModelClient;
  modelName?: string;
  system?: string;
  maxTokens?: number;
  maxIterations?: number;
  onState?: (state: LoopState, iteration: number) => void;
};

export function toolServerOptions(overrides: ToolServerOverrides = {}): StdioMcpClientOptions {
  const { browserArgs, ...rest } = overrides;
  const fromEnv = toolServerCommand();
  const args = browserArgs
    ? [...parseCommandLine(Env.MCP_SERVER_CMD).slice(1), ...browserArgs]
    : fromEnv.args;

  return {
    command: fromEnv.command,
    args,
    timeoutMs: Env.MCP_TIMEOUT_MS,
    startupDelayMs: Env.MCP_STARTUP_DELAY_MS,
    ...rest,
  };
}

/**
 * Run one browsing task in a fresh tool-server session. The server is
 * terminated when the task ends, whichever way it ends.
 */
export async function browse(task: string, opts: BrowseOptions = {}): Promise<ConversationResult> {
  const { provider, model, modelName, system, maxTokens, maxIterations, onState, ...server } = opts;
  const chosen = provider ?? Env.MODEL_PROVIDER;
  const client = model ?? createModelClient(chosen);

  return withStdioMcpClient(toolServerOptions(server), async (mcp) => {
    const toolSchemas = await mcp.listTools();
    if (DEBUG) console.log("[agent] available tools:", toolSchemas.map((t) => t.name).join(", "));

    return runConversation({
      model: client,
      modelName: modelName ?? getDefaultModel(chosen),
      tools: mcp,
      toolSchemas,
      task,
      system: system ?? systemPrompt(),
      maxTokens: maxTokens ?? Env.MAX_TOKENS,
      maxIterations: maxIterations ?? Env.MAX_ITERATIONS,
      onState,
    });
  });
}

export type CheckStep = { step: string; ok: boolean; detail: string };

/**
 * Exercise a tool server without a model: list tools, open a page, snapshot
 * it and close the browser. Failing steps are reported, not thrown.
 */
export async function runToolServerCheck(mcp: McpClient, url = "https://example.com"): Promise<CheckStep[]> {
  const steps: CheckStep[] = [];

  const attempt = async (step: string, fn: () => Promise<string>) => {
    try {
      steps.push({ step, ok: true, detail: await fn() });
    } catch (e) {
      steps.push({ step, ok: false, detail: messageOf(e) });
    }
  };

  await attempt("tools/list", async () => `${(await mcp.listTools()).length} tools`);
  await attempt("browser_navigate", async () => {
    await mcp.callTool("browser_navigate", { url });
    return url;
  });
  await attempt("browser_snapshot", async () => {
    const snapshot = await mcp.callTool("browser_snapshot", {});
    return `${String(snapshot).length} chars`;
  });
  await attempt("browser_close", async () => {
    await mcp.callTool("browser_close", {});
    return "closed";
  });

  return steps;
}

export async function checkToolServer(overrides: ToolServerOverrides = {}): Promise<CheckStep[]> {
  return withStdioMcpClient(toolServerOptions(overrides), (mcp) => runToolServerCheck(mcp));
}
