import { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { AppError, SourceNotFoundError, ValidationError, toSerializedError } from "../domain/errors.js";
import { getLogger } from "../infra/log/logger.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import {
  parseOrThrow,
  parseQueryRequest,
  parseSubmitRequest,
  toAnswerView,
  toSourceView,
} from "../tools/wire.js";

const log = getLogger({ module: "restApi" });

const MAX_BODY_BYTES = 25 * 1024 * 1024;
const SOURCE_PATH = /^\/api\/sources\/([^/]+)$/;

const retryRequestSchema = z.object({
  source_ids: z.array(z.string().min(1)).optional(),
});

/**
 * Routes `/healthz` and `/api/*`. Returns false when the path is not a REST route so
 * the caller can try other handlers.
 */
export async function handleRestRequest(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  service: KnowledgeBaseService,
): Promise<boolean> {
  const method = req.method ?? "GET";
  const pathname = url.pathname.replace(/\/+$/, "") || "/";

  if (pathname !== "/healthz" && !pathname.startsWith("/api/")) {
    return false;
  }

  try {
    if (pathname === "/healthz" && method === "GET") {
      const report = await service.health();
      writeJson(res, report.status === "ok" ? 200 : 503, report);
      return true;
    }

    if (pathname === "/api/sources") {
      if (method === "GET") {
        const sources = await service.listSources();
        writeJson(res, 200, { sources: sources.map(toSourceView) });
        return true;
      }
      if (method === "POST") {
        const input = parseSubmitRequest(await readJsonBody(req));
        const result = await service.submitSource(input);
        writeJson(res, result.queued ? 202 : 200, {
          source_id: result.sourceId,
          status: result.status,
          queued: result.queued,
        });
        return true;
      }
      writeMethodNotAllowed(res);
      return true;
    }

    if (pathname === "/api/sources/retry") {
      if (method !== "POST") {
        writeMethodNotAllowed(res);
        return true;
      }
      const request = parseOrThrow(retryRequestSchema, await readJsonBody(req));
      const result = await service.retryFailedSources(request.source_ids);
      writeJson(res, 200, {
        retried: result.retried,
        skipped: result.skipped.map((entry) => ({ source_id: entry.sourceId, reason: entry.reason })),
      });
      return true;
    }

    const sourceMatch = pathname.match(SOURCE_PATH);
    if (sourceMatch) {
      const sourceId = decodeURIComponent(sourceMatch[1]);
      if (method === "GET") {
        writeJson(res, 200, toSourceView(await service.getStatus(sourceId)));
        return true;
      }
      if (method === "DELETE") {
        const outcome = await service.deleteSource(sourceId);
        if (outcome === "not_found") {
          throw new SourceNotFoundError(sourceId);
        }
        res.writeHead(204);
        res.end();
        return true;
      }
      writeMethodNotAllowed(res);
      return true;
    }

    if (pathname === "/api/query") {
      if (method !== "POST") {
        writeMethodNotAllowed(res);
        return true;
      }
      const input = parseQueryRequest(await readJsonBody(req));
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) {
          controller.abort();
        }
      });
      const result = await service.query({ ...input, signal: controller.signal });
      writeJson(res, 200, toAnswerView(result));
      return true;
    }

    writeJson(res, 404, { code: "NOT_FOUND", message: `No route for ${method} ${pathname}` });
    return true;
  } catch (error) {
    const { statusCode, body } = toSerializedError(error);
    if (statusCode >= 500) {
      log.error({ err: error, method, pathname }, "request failed");
    }
    if (!res.headersSent) {
      writeJson(res, statusCode, body);
    }
    return true;
  }
}

export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new AppError("VALIDATION_ERROR", "Request body is too large.", 413);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

export function writeJson(res: ServerResponse, statusCode: number, payload: unknown) {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeMethodNotAllowed(res: ServerResponse) {
  writeJson(res, 405, { code: "VALIDATION_ERROR", message: "Method not allowed" });
}
