// src/session/verification.ts
import { toolServerOptions } from "../agent/browse.js";
import { Env } from "../env.js";
import { messageOf } from "../mcp/errors.js";
import { StdioMcpClient } from "../mcp/stdioClient.js";
import type { McpClient } from "../mcp/types.js";
import type { SessionHolder } from "./holder.js";

export type VerificationOptions = {
  /** Page to open once the browser is up. */
  url?: string;
  open?: () => Promise<McpClient>;
};

async function closeBrowser(client: McpClient) {
  await client.callTool("browser_close", {});
}

/**
 * Start (or restart) a persistent browser session for manual steps such as a
 * device check. The browser profile keeps whatever the user does in it.
 */
export async function startVerificationSession(
  holder: SessionHolder<McpClient>,
  opts: VerificationOptions = {},
): Promise<McpClient> {
  const open = opts.open ?? (() => StdioMcpClient.open(toolServerOptions()));
  const client = await holder.replace(open, closeBrowser);

  try {
    await client.callTool("browser_install", {});
  } catch (e) {
    console.warn("[session] browser_install failed or was unnecessary:", messageOf(e));
  }

  const url = opts.url ?? Env.VERIFICATION_URL;
  if (url) {
    try {
      await client.callTool("browser_navigate", { url });
    } catch (e) {
      console.warn("[session] initial navigate failed, session still started:", messageOf(e));
    }
  }

  return client;
}

/** Close the browser and the session. Resolves false when none was running. */
export function finishVerificationSession(holder: SessionHolder<McpClient>): Promise<boolean> {
  return holder.release(closeBrowser);
}
