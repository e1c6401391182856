import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";

export function registerDeleteSourceTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "delete_source",
    {
      title: "Delete Source",
      description: "Removes a source with its chunks and vectors. Deleting a missing source is not an error.",
      inputSchema: {
        source_id: z.string().min(1).describe("Source to delete"),
      },
    },
    async ({ source_id }) =>
      runTool("delete_source", async () => ({
        source_id,
        result: await service.deleteSource(source_id),
      })),
  );
}
