// Error taxonomy for the stdio tool-server session.
//
// Setup and transport errors are fatal for the session; RemoteToolError and
// ToolExecutionError only fail a single tool call.

export class McpError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SpawnError extends McpError {
  constructor(
    readonly command: string,
    cause: unknown,
  ) {
    super(`Failed to start tool server "${command}": ${messageOf(cause)}`, { cause });
  }
}

export class HandshakeFailed extends McpError {
  constructor(cause: unknown) {
    super(`Tool server handshake failed: ${messageOf(cause)}`, { cause });
  }
}

export class TransportClosed extends McpError {
  constructor(
    message = "Tool server closed its output stream",
    readonly exitCode: number | null = null,
  ) {
    super(exitCode === null ? message : `${message} (exit code ${exitCode})`);
  }
}

export class TransportTimeout extends McpError {
  constructor(
    readonly method: string,
    readonly timeoutMs: number,
    readonly exitCode: number | null,
  ) {
    super(
      `Timeout after ${timeoutMs}ms waiting for "${method}" response` +
        (exitCode === null ? "" : `; tool server exited with code ${exitCode}`),
    );
  }
}

export class ProtocolDecodeError extends McpError {
  constructor(
    message: string,
    readonly raw: string,
    cause?: unknown,
  ) {
    super(`${message}: ${raw.slice(0, 500)}`, { cause });
  }
}

export class RemoteToolError extends McpError {
  constructor(readonly payload: unknown) {
    super(`Tool server error: ${describePayload(payload)}`);
  }
}

export class ToolExecutionError extends McpError {
  constructor(
    readonly toolName: string,
    cause: unknown,
  ) {
    super(`Tool "${toolName}" failed: ${messageOf(cause)}`, { cause });
  }
}

/** Tool results of a turn do not line up with the calls the model made. */
export class ToolPairingError extends McpError {}

export function isFatalTransportError(e: unknown): boolean {
  return (
    e instanceof TransportClosed ||
    e instanceof TransportTimeout ||
    e instanceof ProtocolDecodeError ||
    e instanceof SpawnError ||
    e instanceof HandshakeFailed
  );
}

export function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function describePayload(payload: unknown): string {
  if (typeof payload === "object" && payload !== null && "message" in payload) {
    const { message } = payload;
    const code = "code" in payload ? payload.code : undefined;
    return code === undefined ? String(message) : `${String(code)} ${String(message)}`;
  }
  return JSON.stringify(payload);
}
