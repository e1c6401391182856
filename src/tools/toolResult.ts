import { AppError, toSerializedError } from "../domain/errors.js";
import { getLogger } from "../infra/log/logger.js";

const log = getLogger({ module: "tools" });

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function jsonResult(payload: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}

/** Runs a tool body; failures come back as an error result carrying `{ code, message, details? }`. */
export async function runTool(
  tool: string,
  work: () => Promise<unknown>,
): Promise<ToolResult> {
  try {
    return jsonResult(await work());
  } catch (error) {
    const { statusCode, body } = toSerializedError(error);
    if (statusCode >= 500 || !(error instanceof AppError)) {
      log.error({ err: error, tool }, "tool failed");
    }
    return { ...jsonResult(body), isError: true };
  }
}
