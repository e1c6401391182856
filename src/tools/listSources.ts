import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SOURCE_STATUSES } from "../domain/types.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";
import { toSourceView } from "./wire.js";

export function registerListSourcesTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "list_sources",
    {
      title: "List Sources",
      description: "Lists submitted sources with their status, oldest first.",
      inputSchema: {
        status: z.enum(SOURCE_STATUSES).optional().describe("Only sources in this status"),
      },
    },
    async ({ status }) =>
      runTool("list_sources", async () => {
        const sources = await service.listSources();
        const filtered = status ? sources.filter((source) => source.status === status) : sources;
        return { sources: filtered.map(toSourceView) };
      }),
  );
}
