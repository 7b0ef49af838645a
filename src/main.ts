#!/usr/bin/env node
// src/main.ts
import { browse, checkToolServer, toolServerOptions } from "./agent/browse.js";
import { makeCli, formatCheck, formatResult, withSpinner } from "./cli/io.js";
import { messageOf } from "./mcp/errors.js";
import { withStdioMcpClient } from "./mcp/stdioClient.js";
import { SessionHolder } from "./session/holder.js";
import { finishVerificationSession, startVerificationSession } from "./session/verification.js";
import type { McpClient } from "./mcp/types.js";

const HELP = `
Usage
  browser-tool-agent "<task>"     Run one browsing task and print the answer
  browser-tool-agent              Interactive: each line is a task
  browser-tool-agent --tools      List the tool server's tools
  browser-tool-agent --check      Navigate/snapshot/close smoke check (no model)
  browser-tool-agent --verify     Open a persistent browser until Enter is pressed
`.trim();

async function runTask(task: string) {
  const result = await withSpinner("Working", () => browse(task));
  console.log(formatResult(result));
}

async function listToolsCommand() {
  const tools = await withStdioMcpClient(toolServerOptions(), (mcp) => mcp.listTools());
  for (const t of tools) console.log(`${t.name}\t${t.description.split("\n")[0]}`);
}

async function verifyCommand() {
  const holder = new SessionHolder<McpClient>();
  const { rl, ask } = makeCli();
  try {
    await startVerificationSession(holder);
    await ask("Browser session started. Complete the manual steps, then press Enter to finish. ");
  } finally {
    rl.close();
    await finishVerificationSession(holder);
  }
  console.log("Verification finished; the browser profile keeps the updated state.");
}

async function interactive() {
  const { rl, ask } = makeCli();
  console.log("Browser agent ready. Describe a task (empty line to quit).\n");
  try {
    while (true) {
      const task = (await ask("> ")).trim();
      if (!task) break;
      try {
        await runTask(task);
      } catch (e) {
        console.error(`Task failed: ${messageOf(e)}`);
      }
    }
  } finally {
    rl.close();
  }
}

async function main(argv: string[]) {
  const [first] = argv;
  if (first === "--help" || first === "-h") return console.log(HELP);
  if (first === "--tools") return listToolsCommand();
  if (first === "--check") {
    const steps = await checkToolServer();
    console.log(formatCheck(steps));
    if (steps.some((s) => !s.ok)) process.exitCode = 1;
    return;
  }
  if (first === "--verify") return verifyCommand();
  if (argv.length > 0) return runTask(argv.join(" "));
  return interactive();
}

main(process.argv.slice(2)).catch((e) => {
  console.error(`Error: ${messageOf(e)}`);
  process.exit(1);
});
