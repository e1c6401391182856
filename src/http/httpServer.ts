import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { AddressInfo } from "node:net";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../domain/errors.js";
import { getLogger } from "../infra/log/logger.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { handleRestRequest, readJsonBody, writeJson } from "./restApi.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

export const MCP_PATH = "/mcp";

const log = getLogger({ module: "httpServer" });

export interface HttpServerOptions {
  host: string;
  /** 0 picks a free port. */
  port: number;
  service: KnowledgeBaseService;
  serverFactory: () => McpServer;
}

export interface RunningHttpServer {
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const sessions: SessionMap = {};

  const httpServer = createServer((req, res) => {
    handleRequest(req, res, options, sessions).catch((error: unknown) => {
      log.error({ err: error, url: req.url }, "unhandled request error");
      if (!res.headersSent) {
        writeJson(res, 500, { code: "INTERNAL_ERROR", message: errorMessage(error) });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => resolve());
  });
  const address = httpServer.address();
  const port = isAddressInfo(address) ? address.port : options.port;

  return {
    port,
    close: async () => {
      await Promise.all(
        Object.values(sessions).map(async (entry) => {
          await entry.transport.close();
          await entry.server.close();
        }),
      );

      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: HttpServerOptions,
  sessions: SessionMap,
) {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  if (await handleRestRequest(req, res, url, options.service)) {
    return;
  }

  if (url.pathname !== MCP_PATH) {
    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not found");
    return;
  }

  if (req.method === "POST") {
    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      writeJsonRpcError(res, 400, -32700, errorMessage(error));
      return;
    }
    await handleMcpPost(req, res, body, sessions, options.serverFactory);
    return;
  }

  if (req.method === "GET" || req.method === "DELETE") {
    await handleSessionRequest(req, res, sessions);
    return;
  }

  writeJsonRpcError(res, 405, -32000, "Method not allowed");
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    entry.server.close().catch((error: unknown) => {
      log.warn({ err: error, sessionId: closedSessionId }, "closing MCP session failed");
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  const entry = sessionId ? sessions[sessionId] : undefined;
  if (!entry) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await entry.transport.handleRequest(req, res);
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}
