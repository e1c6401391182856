import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";
import { toSourceView } from "./wire.js";

export function registerGetSourceStatusTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "get_source_status",
    {
      title: "Get Source Status",
      description: "Returns the ingestion status and metadata of one source.",
      inputSchema: {
        source_id: z.string().min(1).describe("Source id returned by submit_source"),
      },
    },
    async ({ source_id }) =>
      runTool("get_source_status", async () => toSourceView(await service.getStatus(source_id))),
  );
}
