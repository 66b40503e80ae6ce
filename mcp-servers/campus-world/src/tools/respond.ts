import { fail, internalError, WorldStateError, type OpResult } from "../result.js";

type TextContent = { type: "text"; text: string };

/**
 * Renders an OpResult as tool output: the message first, then the result
 * envelope as JSON for callers that want structure.
 */
export function respond<T>(result: OpResult<T>): { content: TextContent[]; isError?: boolean } {
  const envelope: Record<string, unknown> = { status: result.status };
  if (result.error_code) envelope.error_code = result.error_code;
  if (result.data !== undefined) envelope.data = result.data;

  const content: TextContent[] = [
    { type: "text", text: result.message },
    { type: "text", text: JSON.stringify(envelope, null, 2) },
  ];
  return result.status === "success" ? { content } : { content, isError: true };
}

/** For handlers that await I/O: a corrupted snapshot is VALIDATION, anything else INTERNAL. */
export function respondToFault(operation: string, err: unknown): { content: TextContent[]; isError?: boolean } {
  console.error(`[campus] ${operation} failed:`, err);
  if (err instanceof WorldStateError) return respond(fail("VALIDATION", err.message));
  const reason = err instanceof Error ? err.message : String(err);
  return respond(internalError(`Failed to ${operation}: ${reason}`));
}
