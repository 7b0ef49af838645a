export type JsonObject = Record<string, unknown>;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params: JsonObject;
};

export type JsonRpcNotification = {
  jsonrpc: "2.0";
  method: string;
  params?: JsonObject;
};

export type JsonRpcResponse = {
  jsonrpc?: "2.0";
  id?: number | string | null;
  method?: string;
  result?: unknown;
  error?: unknown;
};

/** Tool as advertised by the server in `tools/list`. */
export type ToolDescriptor = {
  name: string;
  description?: string;
  inputSchema?: JsonObject;
};

export type ToolInputSchema = {
  type: "object";
  properties?: JsonObject;
  required?: string[];
  [key: string]: unknown;
};

/** Tool in the shape the model APIs take. */
export type ToolSchema = {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
};

export type ClientInfo = {
  name: string;
  version: string;
};

export type ServerInfo = {
  protocolVersion?: string;
  capabilities?: JsonObject;
  serverInfo?: { name?: string; version?: string };
};

export interface McpClient {
  listTools(): Promise<ToolSchema[]>;
  callTool(name: string, args: JsonObject): Promise<unknown>;
  close(): Promise<void>;
}

export function isJsonObject(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}
