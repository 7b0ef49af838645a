// src/mcp/framer.ts
import readline from "node:readline";
import type { Readable, Writable } from "node:stream";

import { DEBUG } from "../env.js";
import { ProtocolDecodeError, RemoteToolError, TransportClosed, TransportTimeout } from "./errors.js";
import { isJsonObject, type JsonObject, type JsonRpcNotification, type JsonRpcRequest } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
/** How long a closed stream waits for the process exit status. */
export const EXIT_GRACE_MS = 500;

/** The pipes of a tool server plus a way to probe whether it has exited. */
export interface LineChannel {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly exitCode: number | null;
  /** Settles on process exit. stdout usually closes before the exit status is known. */
  readonly exited?: Promise<void>;
}

export interface RpcTransport {
  send(method: string, params?: JsonObject): Promise<unknown>;
  notify(method: string, params?: JsonObject): Promise<void>;
}

type NextLine = { kind: "line"; line: string } | { kind: "closed" } | { kind: "timeout" };

/**
 * Newline-delimited JSON-RPC over a process's stdin/stdout.
 *
 * One request is outstanding at a time: send() writes a request and waits for
 * the next response line, which must carry the same id. Concurrent calls are
 * queued. A timeout or undecodable line leaves the stream in an unknown
 * position, so the transport refuses further requests after either.
 */
export class LineTransport implements RpcTransport {
  private nextId = 1;
  private readonly buffered: string[] = [];
  private waiter: ((next: NextLine) => void) | null = null;
  private ended = false;
  private broken: Error | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly lines: readline.Interface;
  private readonly timeoutMs: number;

  constructor(
    private readonly channel: LineChannel,
    opts: { timeoutMs?: number } = {},
  ) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.lines = readline.createInterface({ input: channel.stdout, crlfDelay: Infinity });
    this.lines.on("line", (line) => this.deliver({ kind: "line", line }));
    this.lines.on("close", () => {
      this.ended = true;
      this.deliver({ kind: "closed" });
    });
  }

  send(method: string, params: JsonObject = {}): Promise<unknown> {
    return this.serialize(() => this.exchange(method, params));
  }

  notify(method: string, params?: JsonObject): Promise<void> {
    const msg: JsonRpcNotification = params ? { jsonrpc: "2.0", method, params } : { jsonrpc: "2.0", method };
    return this.serialize(() => this.write(JSON.stringify(msg)));
  }

  close() {
    this.lines.close();
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async exchange(method: string, params: JsonObject): Promise<unknown> {
    const id = this.nextId++;
    const req: JsonRpcRequest = { jsonrpc: "2.0", id, method, params };
    await this.write(JSON.stringify(req));

    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      const next = await this.readLine(deadline - Date.now());
      if (next.kind === "closed") throw this.fail(new TransportClosed(undefined, await this.exitStatus()));
      if (next.kind === "timeout") {
        throw this.fail(new TransportTimeout(method, this.timeoutMs, this.channel.exitCode));
      }

      const text = next.line.trim();
      if (!text) continue;
      if (DEBUG) console.log("[mcp<-]", text.slice(0, 500));

      let msg: unknown;
      try {
        msg = JSON.parse(text);
      } catch (e) {
        throw this.fail(new ProtocolDecodeError("Malformed JSON from tool server", text, e));
      }
      if (!isJsonObject(msg)) throw this.fail(new ProtocolDecodeError("Expected a JSON-RPC object", text));

      // Server-side notifications and requests (logging, progress, ping) may
      // interleave with responses. Only messages without a method are responses.
      if (typeof msg.method === "string") {
        if (msg.id === undefined) {
          if (DEBUG) console.log("[mcp] skipped notification:", msg.method);
        } else {
          await this.answerServerRequest(msg.id, msg.method);
        }
        continue;
      }

      if (msg.id !== id) {
        throw this.fail(new ProtocolDecodeError(`Response id ${String(msg.id)} does not match request id ${id}`, text));
      }

      if ("error" in msg) throw new RemoteToolError(msg.error);
      return msg.result ?? {};
    }
  }

  private answerServerRequest(id: unknown, method: string): Promise<void> {
    if (DEBUG) console.log("[mcp] answering server request:", method);
    const reply =
      method === "ping"
        ? { jsonrpc: "2.0", id, result: {} }
        : { jsonrpc: "2.0", id, error: { code: -32601, message: `Method not found: ${method}` } };
    return this.write(JSON.stringify(reply));
  }

  private async exitStatus(): Promise<number | null> {
    const { exited } = this.channel;
    if (this.channel.exitCode === null && exited) {
      let timer: NodeJS.Timeout | undefined;
      await Promise.race([exited, new Promise<void>((r) => (timer = setTimeout(r, EXIT_GRACE_MS)))]);
      clearTimeout(timer);
    }
    return this.channel.exitCode;
  }

  /** Lines read from the server but not yet consumed by a request. */
  get backlog(): number {
    return this.buffered.length;
  }

  private write(line: string): Promise<void> {
    if (this.broken) {
      return Promise.reject(
        new TransportClosed(`Transport unusable after earlier failure (${this.broken.message})`, this.channel.exitCode),
      );
    }
    const { stdin } = this.channel;
    if (stdin.destroyed || stdin.writableEnded) {
      return Promise.reject(this.fail(new TransportClosed("Tool server input is closed", this.channel.exitCode)));
    }

    if (DEBUG) console.log("[mcp->]", line);
    return new Promise((resolve, reject) => {
      stdin.write(line + "\n", (err) => {
        if (err) reject(this.fail(new TransportClosed(`Write failed: ${err.message}`, this.channel.exitCode)));
        else resolve();
      });
    });
  }

  private readLine(remainingMs: number): Promise<NextLine> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve({ kind: "line", line });
    if (this.ended) return Promise.resolve({ kind: "closed" });

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: "timeout" });
      }, Math.max(0, remainingMs));
      this.waiter = (next) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(next);
      };
    });
  }

  private deliver(next: NextLine) {
    if (this.waiter) {
      this.waiter(next);
      return;
    }
    // Nothing reads a broken transport again.
    if (next.kind === "line" && !this.broken) this.buffered.push(next.line);
  }

  private fail<E extends Error>(e: E): E {
    this.broken ??= e;
    this.buffered.length = 0;
    return e;
  }
}
