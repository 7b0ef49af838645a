// src/mcp/process.ts
import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import readline from "node:readline";

import { DEBUG } from "../env.js";
import { SpawnError, messageOf } from "./errors.js";

export type StderrSink = (line: string) => void;

export type SpawnToolServerOptions = {
  /** Merged over the inherited environment. */
  env?: Record<string, string>;
  onStderr?: StderrSink;
  /** How long terminate() waits after SIGTERM before sending SIGKILL. */
  killGraceMs?: number;
};

const defaultStderrSink: StderrSink = (line) => {
  if (DEBUG) console.error("[mcp stderr]", line);
};

/**
 * A running tool server with its three pipes.
 *
 * stderr is drained line by line into the sink for the lifetime of the
 * process, independently of the request/response traffic on stdin/stdout.
 */
export class ToolServerProcess {
  private readonly stderrLines: readline.Interface;
  /** Settles when the process has exited, whatever the cause. */
  readonly exited: Promise<void>;
  private terminating: Promise<void> | null = null;

  constructor(
    readonly command: string,
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly opts: SpawnToolServerOptions = {},
  ) {
    this.exited = new Promise((resolve) => {
      if (this.hasExited) resolve();
      else child.once("exit", () => resolve());
    });

    // Late errors (EPIPE after the server died, failed kill) must not crash the host.
    child.on("error", (e) => console.error("[mcp] process error:", e.message));
    child.stdin.on("error", (e) => {
      if (DEBUG) console.error("[mcp] stdin error:", e.message);
    });

    const sink = opts.onStderr ?? defaultStderrSink;
    this.stderrLines = readline.createInterface({ input: child.stderr, crlfDelay: Infinity });
    this.stderrLines.on("line", (line) => {
      try {
        sink(line);
      } catch (e) {
        console.error("[mcp stderr] sink failed:", messageOf(e));
      }
    });
  }

  get stdin() {
    return this.child.stdin;
  }

  get stdout() {
    return this.child.stdout;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Exit status, or null while running (or when killed by a signal). */
  get exitCode(): number | null {
    return this.child.exitCode;
  }

  get hasExited(): boolean {
    return this.child.exitCode !== null || this.child.signalCode !== null;
  }

  /** SIGTERM, wait, SIGKILL after the grace period. Idempotent; never throws. */
  terminate(): Promise<void> {
    if (!this.terminating) this.terminating = this.stop();
    return this.terminating;
  }

  private async stop() {
    this.stderrLines.close();

    if (!this.hasExited) {
      if (DEBUG) console.log("[mcp] terminating", this.command, "pid", this.child.pid);
      this.signal("SIGTERM");
      const timer = setTimeout(() => {
        if (!this.hasExited) this.signal("SIGKILL");
      }, this.opts.killGraceMs ?? 5_000);
      try {
        await this.exited;
      } finally {
        clearTimeout(timer);
      }
    }

    this.child.stdin.destroy();
    this.child.stdout.destroy();
    this.child.stderr.destroy();
  }

  private signal(sig: NodeJS.Signals) {
    try {
      this.child.kill(sig);
    } catch (e) {
      console.warn(`[mcp] failed to send ${sig}:`, messageOf(e));
    }
  }
}

/**
 * Start the tool server and wait until the OS has actually spawned it.
 * A missing executable or permission problem rejects with SpawnError.
 */
export async function spawnToolServer(
  command: string,
  args: string[] = [],
  opts: SpawnToolServerOptions = {},
): Promise<ToolServerProcess> {
  if (DEBUG) console.log("[mcp] starting:", [command, ...args].join(" "));

  let child: ChildProcessWithoutNullStreams;
  try {
    // Inherit the environment so DISPLAY is available for a headed browser.
    child = spawn(command, args, { env: { ...process.env, ...opts.env } });
  } catch (e) {
    throw new SpawnError(command, e);
  }

  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      child.off("error", onError);
      resolve();
    };
    const onError = (e: Error) => {
      child.off("spawn", onSpawn);
      reject(new SpawnError(command, e));
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });

  return new ToolServerProcess(command, child, opts);
}
