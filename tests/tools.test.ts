import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { KnowledgeBaseService } from "../src/services/knowledgeBaseService.js";
import { registerTools } from "../src/tools/index.js";
import { DEPLOY_PAGE, DEPLOY_URL, createHarness } from "./helpers/fakes.js";

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean().optional(),
});

const submitBodySchema = z.object({
  source_id: z.string(),
  status: z.string(),
  queued: z.boolean(),
});

interface Connection {
  client: Client;
  close: () => Promise<void>;
}

async function connect(service: KnowledgeBaseService): Promise<Connection> {
  const server = new McpServer({ name: "test-server", version: "0.0.0" });
  registerTools(server, service);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await client.connect(clientTransport);
  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

async function call(
  client: Client,
  name: string,
  args: Record<string, unknown>,
): Promise<{ isError: boolean; body: unknown }> {
  const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const body: unknown = JSON.parse(result.content[0]?.text ?? "null");
  return { isError: result.isError ?? false, body };
}

describe("MCP tools", () => {
  let connection: Connection | null = null;

  afterEach(async () => {
    await connection?.close();
    connection = null;
  });

  it("registers every tool", async () => {
    connection = await connect(createHarness().service);
    const { tools } = await connection.client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_with_citations",
      "delete_source",
      "get_source_status",
      "health_check",
      "list_sources",
      "retry_failed_sources",
      "submit_source",
    ]);
  });

  it("submits an upload and reports its status", async () => {
    const { service } = createHarness();
    connection = await connect(service);

    const submitted = await call(connection.client, "submit_source", {
      origin_kind: "document",
      filename: "notes.txt",
      content_base64: Buffer.from("Billing runs nightly.", "utf-8").toString("base64"),
    });
    expect(submitted.isError).toBe(false);
    const { source_id: sourceId, status, queued } = submitBodySchema.parse(submitted.body);
    expect(status).toBe("pending");
    expect(queued).toBe(true);
    await service.whenIdle();

    const fetched = await call(connection.client, "get_source_status", { source_id: sourceId });
    expect(fetched.body).toMatchObject({
      source_id: sourceId,
      origin_kind: "document",
      display_name: "notes.txt",
      status: "completed",
      chunk_count: 1,
      error: null,
    });

    const listed = await call(connection.client, "list_sources", { status: "failed" });
    expect(listed.body).toEqual({ sources: [] });
  });

  it("returns validation failures as error results", async () => {
    connection = await connect(createHarness().service);

    const result = await call(connection.client, "submit_source", { origin_kind: "web_page" });
    expect(result.isError).toBe(true);
    expect(result.body).toMatchObject({ code: "VALIDATION_ERROR", message: "Validation failed" });
  });

  it("reports unknown sources", async () => {
    connection = await connect(createHarness().service);

    const status = await call(connection.client, "get_source_status", { source_id: "src_missing" });
    expect(status.isError).toBe(true);
    expect(status.body).toEqual({
      code: "NOT_FOUND",
      message: "Source src_missing not found.",
      details: { sourceId: "src_missing" },
    });

    const deleted = await call(connection.client, "delete_source", { source_id: "src_missing" });
    expect(deleted).toEqual({
      isError: false,
      body: { source_id: "src_missing", result: "not_found" },
    });
  });

  it("answers with snake_case citations", async () => {
    const harness = createHarness();
    harness.web.pages.set(DEPLOY_URL, DEPLOY_PAGE);
    const { sourceId } = await harness.service.submitSource({ originKind: "web_page", url: DEPLOY_URL });
    await harness.service.whenIdle();
    harness.generation.reply = "Final Answer: Five minutes [1].";
    connection = await connect(harness.service);

    const result = await call(connection.client, "ask_with_citations", {
      question: "How long does a deploy take?",
    });
    expect(result.isError).toBe(false);
    expect(result.body).toMatchObject({
      answer: "Five minutes [1].",
      reasoning: null,
      status: "answered",
      unknown_citations: [],
      citations: [
        {
          number: 1,
          source_id: sourceId,
          origin_kind: "web_page",
          display_name: "Deploy Guide",
          location: DEPLOY_URL,
          chunk_ids: [`${sourceId}:0`, `${sourceId}:1`],
        },
      ],
    });
  });
});
