export * from "./mcp/errors.js";
export type * from "./mcp/types.js";
export { isJsonObject } from "./mcp/types.js";
export { spawnToolServer, ToolServerProcess, type SpawnToolServerOptions, type StderrSink } from "./mcp/process.js";
export { LineTransport, DEFAULT_TIMEOUT_MS, type LineChannel, type RpcTransport } from "./mcp/framer.js";
export { handshake, PROTOCOL_VERSION, CLIENT_INFO } from "./mcp/handshake.js";
export { listTools, toToolSchema, defaultInputSchema } from "./mcp/catalog.js";
export { firstContentValue } from "./mcp/parseContent.js";
export { StdioMcpClient, withStdioMcpClient, type StdioMcpClientOptions } from "./mcp/stdioClient.js";

export type * from "./agent/model.js";
export { AnthropicModelClient } from "./agent/anthropicClient.js";
export { OllamaModelClient } from "./agent/ollamaClient.js";
export { createModelClient, getDefaultModel, type ModelProvider } from "./agent/modelClient.js";
export { runConversation, pairToolResults, type ConversationResult, type LoopState } from "./agent/run.js";
export { invokeTool, type ToolExecutor } from "./agent/tools/invoke.js";
export { toolResultToString, type ToolOutcome } from "./agent/tools/result.js";
export { browse, checkToolServer, runToolServerCheck, toolServerOptions, type BrowseOptions } from "./agent/browse.js";
export { SessionHolder } from "./session/holder.js";
export { startVerificationSession, finishVerificationSession } from "./session/verification.js";
