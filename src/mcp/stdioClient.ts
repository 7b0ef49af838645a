// src/mcp/stdioClient.ts
import { DEBUG } from "../env.js";
import { listTools } from "./catalog.js";
import { ToolExecutionError, messageOf } from "./errors.js";
import { LineTransport } from "./framer.js";
import { handshake } from "./handshake.js";
import { firstContentValue, isErrorResult } from "./parseContent.js";
import { spawnToolServer, type StderrSink, type ToolServerProcess } from "./process.js";
import type { ClientInfo, JsonObject, McpClient, ServerInfo, ToolSchema } from "./types.js";

export type StdioMcpClientOptions = {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Pause between spawn and handshake, for servers slow to attach stdin. */
  startupDelayMs?: number;
  capabilities?: JsonObject;
  clientInfo?: ClientInfo;
  onStderr?: StderrSink;
  killGraceMs?: number;
};

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * One tool-server session: a spawned process, its transport and the tool
 * catalog. Only obtainable through open(), so no tool call can precede the
 * handshake.
 */
export class StdioMcpClient implements McpClient {
  private tools: ToolSchema[] | null = null;
  private closing: Promise<void> | null = null;

  private constructor(
    private readonly proc: ToolServerProcess,
    private readonly transport: LineTransport,
    readonly server: ServerInfo,
  ) {}

  static async open(opts: StdioMcpClientOptions): Promise<StdioMcpClient> {
    const proc = await spawnToolServer(opts.command, opts.args ?? [], {
      env: opts.env,
      onStderr: opts.onStderr,
      killGraceMs: opts.killGraceMs,
    });
    const transport = new LineTransport(proc, { timeoutMs: opts.timeoutMs });

    try {
      if (opts.startupDelayMs) await sleep(opts.startupDelayMs);
      const server = await handshake(transport, opts.capabilities, opts.clientInfo);
      return new StdioMcpClient(proc, transport, server);
    } catch (e) {
      transport.close();
      await proc.terminate();
      throw e;
    }
  }

  get exitCode(): number | null {
    return this.proc.exitCode;
  }

  get isRunning(): boolean {
    return !this.proc.hasExited;
  }

  /** Fetched once per session; the catalog does not change afterwards. */
  async listTools(): Promise<ToolSchema[]> {
    if (!this.tools) this.tools = await listTools(this.transport);
    return this.tools;
  }

  async callTool(name: string, args: JsonObject): Promise<unknown> {
    if (DEBUG) console.log(`[mcp] calling ${name}`, JSON.stringify(args));
    const result = await this.transport.send("tools/call", { name, arguments: args });
    const value = firstContentValue(result);

    if (isErrorResult(result)) {
      throw new ToolExecutionError(name, typeof value === "string" ? value : JSON.stringify(value));
    }
    return value;
  }

  /** Terminates the server. Idempotent; cleanup failures are logged, not thrown. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = (async () => {
        try {
          this.transport.close();
        } catch (e) {
          console.warn("[mcp] transport close failed:", messageOf(e));
        }
        await this.proc.terminate();
      })();
    }
    return this.closing;
  }
}

/** Scoped session: the server is terminated however `fn` exits. */
export async function withStdioMcpClient<T>(
  opts: StdioMcpClientOptions,
  fn: (client: StdioMcpClient) => Promise<T>,
): Promise<T> {
  const client = await StdioMcpClient.open(opts);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
