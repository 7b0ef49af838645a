// src/mcp/handshake.ts
import { z } from "zod";

import { DEBUG } from "../env.js";
import { HandshakeFailed } from "./errors.js";
import type { RpcTransport } from "./framer.js";
import type { ClientInfo, JsonObject, ServerInfo } from "./types.js";

export const PROTOCOL_VERSION = "2024-11-05";

export const CLIENT_INFO: ClientInfo = { name: "browser-tool-agent", version: "1.0.0" };

export const DEFAULT_CAPABILITIES: JsonObject = { tools: {} };

const ServerInfoSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    serverInfo: z
      .object({
        name: z.string().optional(),
        version: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * initialize -> notifications/initialized.
 *
 * The notification goes out right after the initialize result arrives and
 * before anything else is sent; it has no id and gets no reply.
 */
export async function handshake(
  transport: RpcTransport,
  capabilities: JsonObject = DEFAULT_CAPABILITIES,
  clientInfo: ClientInfo = CLIENT_INFO,
): Promise<ServerInfo> {
  let result: unknown;
  try {
    result = await transport.send("initialize", {
      protocolVersion: PROTOCOL_VERSION,
      capabilities,
      clientInfo,
    });
    await transport.notify("notifications/initialized");
  } catch (e) {
    throw new HandshakeFailed(e);
  }

  const parsed = ServerInfoSchema.safeParse(result);
  const info: ServerInfo = parsed.success ? parsed.data : {};
  if (DEBUG) {
    console.log("[mcp] initialized:", info.serverInfo?.name ?? "(unnamed server)", info.protocolVersion ?? "");
  }
  return info;
}
