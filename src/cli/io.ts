// src/cli/io.ts
import readline from "node:readline";

import type { ConversationResult } from "../agent/run.js";
import type { CheckStep } from "../agent/browse.js";

export function makeCli() {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const ask = (q: string) => new Promise<string>((res) => rl.question(q, res));
  return { rl, ask };
}

export function formatResult(result: ConversationResult): string {
  const head =
    result.status === "done"
      ? `Done after ${result.iterations} model turn(s).`
      : `Stopped at the iteration limit (${result.iterations} turns).`;
  return result.text ? `${head}\n\n${result.text}` : head;
}

export function formatCheck(steps: CheckStep[]): string {
  return steps.map((s) => `${s.ok ? "ok  " : "FAIL"} ${s.step}: ${s.detail}`).join("\n");
}

/**
 * Spinner for long awaits (a browsing task can take minutes).
 * Only drawn on a TTY so piped output stays clean.
 */
export async function withSpinner<T>(label: string, fn: () => Promise<T>): Promise<T> {
  if (!process.stdout.isTTY) return fn();

  const frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let i = 0;
  const timer = setInterval(() => {
    process.stdout.write(`\r${frames[i++ % frames.length]} ${label}...`);
  }, 80);

  try {
    return await fn();
  } finally {
    clearInterval(timer);
    process.stdout.write("\r\x1b[2K");
  }
}
