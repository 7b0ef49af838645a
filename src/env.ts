import dotenv from "dotenv";
import { z } from "zod";

// .env is optional here: the tool server and model provider can be configured
// entirely from the shell environment.
dotenv.config();

export const EnvSchema = z.object({
  // Model provider
  MODEL_PROVIDER: z.enum(["anthropic", "ollama"]).default("anthropic"),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-3-5-sonnet-20241022"),
  MAX_TOKENS: z.coerce.number().int().positive().default(2048),

  // Ollama
  OLLAMA_URL: z.string().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("qwen2.5:7b-instruct"),

  // Tool server (stdio)
  MCP_SERVER_CMD: z.string().default("npx @playwright/mcp@latest"),
  BROWSER_ARGS: z.string().default(""),
  MCP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MCP_STARTUP_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),

  // Agent loop
  MAX_ITERATIONS: z.coerce.number().int().positive().default(30),

  // Persistent browser session
  VERIFICATION_URL: z.string().url().optional(),

  // Debug
  MCP_DEBUG: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  // Empty strings in .env mean "unset".
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ""));
  return EnvSchema.parse(cleaned);
}

export const Env = loadEnv();

export const DEBUG = (Env.MCP_DEBUG ?? "").trim() === "1";

/**
 * Split a command line on whitespace. Quoting is not supported; put arguments
 * containing spaces in BROWSER_ARGS one per token instead.
 */
export function parseCommandLine(s: string): string[] {
  return s.split(/\s+/).filter(Boolean);
}

export function toolServerCommand(config: EnvConfig = Env): { command: string; args: string[] } {
  const [command, ...args] = parseCommandLine(config.MCP_SERVER_CMD);
  if (!command) throw new Error("MCP_SERVER_CMD is empty");
  return { command, args: [...args, ...parseCommandLine(config.BROWSER_ARGS)] };
}
