import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { RunningHttpServer, startHttpServer } from "../src/http/httpServer.js";
import { registerTools } from "../src/tools/index.js";
import { DEPLOY_PAGE, DEPLOY_URL, createHarness } from "./helpers/fakes.js";

const submitBodySchema = z.object({
  source_id: z.string(),
  status: z.string(),
  queued: z.boolean(),
});

describe("REST API", () => {
  let harness: ReturnType<typeof createHarness>;
  let server: RunningHttpServer;
  let baseUrl: string;

  beforeEach(async () => {
    harness = createHarness();
    harness.web.pages.set(DEPLOY_URL, DEPLOY_PAGE);
    const service = harness.service;
    server = await startHttpServer({
      host: "127.0.0.1",
      port: 0,
      service,
      serverFactory: () => {
        const mcp = new McpServer({ name: "test-server", version: "0.0.0" });
        registerTools(mcp, service);
        return mcp;
      },
    });
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterEach(async () => {
    await server.close();
  });

  function post(path: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });
  }

  async function submitDeployPage(): Promise<string> {
    const response = await post(
      "/api/sources",
      JSON.stringify({ origin_kind: "web_page", url: DEPLOY_URL }),
    );
    expect(response.status).toBe(202);
    const body = submitBodySchema.parse(await response.json());
    await harness.service.whenIdle();
    return body.source_id;
  }

  it("reports health", async () => {
    const response = await fetch(`${baseUrl}/healthz`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: "ok" });
  });

  it("returns 503 when a component is down", async () => {
    harness.embedding.pingError = new Error("connection refused");
    const response = await fetch(`${baseUrl}/healthz`);
    expect(response.status).toBe(503);
  });

  it("submits, lists and reads sources", async () => {
    const sourceId = await submitDeployPage();

    const one = await fetch(`${baseUrl}/api/sources/${sourceId}`);
    expect(one.status).toBe(200);
    expect(await one.json()).toMatchObject({
      source_id: sourceId,
      status: "completed",
      chunk_count: 2,
      display_name: "Deploy Guide",
    });

    const all = await fetch(`${baseUrl}/api/sources`);
    const listed = z
      .object({ sources: z.array(z.object({ source_id: z.string() })) })
      .parse(await all.json());
    expect(listed.sources.map((source) => source.source_id)).toEqual([sourceId]);
  });

  it("answers questions", async () => {
    await submitDeployPage();
    harness.generation.reply = "Final Answer: Five minutes [1].";

    const response = await post("/api/query", JSON.stringify({ question: "How long does a deploy take?", top_k: 3 }));
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      answer: "Five minutes [1].",
      status: "answered",
      unknown_citations: [],
    });
  });

  it("rejects malformed bodies", async () => {
    const invalidJson = await post("/api/query", "{");
    expect(invalidJson.status).toBe(400);
    expect(await invalidJson.json()).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON body",
    });

    const outOfRange = await post("/api/query", JSON.stringify({ question: "Why?", top_k: 500 }));
    expect(outOfRange.status).toBe(400);
  });

  it("deletes sources", async () => {
    const sourceId = await submitDeployPage();

    const deleted = await fetch(`${baseUrl}/api/sources/${sourceId}`, { method: "DELETE" });
    expect(deleted.status).toBe(204);

    const again = await fetch(`${baseUrl}/api/sources/${sourceId}`, { method: "DELETE" });
    expect(again.status).toBe(404);
    expect(await again.json()).toMatchObject({ code: "NOT_FOUND" });
  });

  it("retries failed sources", async () => {
    const response = await post("/api/sources/retry", JSON.stringify({ source_ids: ["src_missing"] }));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      retried: [],
      skipped: [{ source_id: "src_missing", reason: "not_found" }],
    });
  });

  it("answers unknown routes and methods", async () => {
    const unknown = await fetch(`${baseUrl}/api/nope`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/nope",
    });

    const wrongMethod = await fetch(`${baseUrl}/api/sources`, { method: "PUT" });
    expect(wrongMethod.status).toBe(405);

    const outside = await fetch(`${baseUrl}/elsewhere`);
    expect(outside.status).toBe(404);
    expect(await outside.text()).toBe("Not found");
  });

  it("requires an MCP session for non-initialize requests", async () => {
    const response = await post(
      "/mcp",
      JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
    );
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: {
        code: -32000,
        message: "Initialize request is required when session is not established",
      },
      id: null,
    });
  });
});
