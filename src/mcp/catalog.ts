// src/mcp/catalog.ts
import { DEBUG } from "../env.js";
import type { RpcTransport } from "./framer.js";
import { isJsonObject, type ToolInputSchema, type ToolSchema } from "./types.js";

export function defaultInputSchema(): ToolInputSchema {
  return { type: "object", properties: {}, required: [] };
}

/**
 * Map one `tools/list` entry to the model-facing tool shape.
 * Total: missing or malformed fields get defaults, never an error.
 */
export function toToolSchema(raw: unknown): ToolSchema {
  const d = isJsonObject(raw) ? raw : {};
  const name = typeof d.name === "string" ? d.name : String(d.name ?? "");
  const description = typeof d.description === "string" ? d.description : "";

  // The model APIs only take object schemas.
  const input_schema: ToolInputSchema = isJsonObject(d.inputSchema)
    ? { ...d.inputSchema, type: "object" }
    : defaultInputSchema();

  return { name, description, input_schema };
}

export async function listTools(transport: RpcTransport): Promise<ToolSchema[]> {
  const result = await transport.send("tools/list");
  const tools: unknown[] = isJsonObject(result) && Array.isArray(result.tools) ? result.tools : [];
  const schemas = tools.map(toToolSchema);

  if (DEBUG) console.log(`[mcp] found ${schemas.length} tools:`, schemas.map((t) => t.name).join(", "));
  return schemas;
}
