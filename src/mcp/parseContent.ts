import { isJsonObject } from "./types.js";

/**
 * Value of a `tools/call` result: the first content element's `text`, or the
 * element itself when it has none. With no content, the (empty) content value.
 */
export function firstContentValue(result: unknown): unknown {
  const content = isJsonObject(result) ? (result.content ?? []) : [];
  if (Array.isArray(content) && content.length > 0) {
    const first: unknown = content[0];
    if (isJsonObject(first) && "text" in first) return first.text;
    return first;
  }
  return content;
}

export function isErrorResult(result: unknown): boolean {
  return isJsonObject(result) && result.isError === true;
}
