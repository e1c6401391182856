import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";

export function registerRetryFailedSourcesTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "retry_failed_sources",
    {
      title: "Retry Failed Sources",
      description: "Re-queues failed sources, all of them or the given ids.",
      inputSchema: {
        source_ids: z.array(z.string().min(1)).optional().describe("Sources to retry"),
      },
    },
    async ({ source_ids }) =>
      runTool("retry_failed_sources", async () => {
        const result = await service.retryFailedSources(source_ids);
        return {
          retried: result.retried,
          skipped: result.skipped.map((entry) => ({
            source_id: entry.sourceId,
            reason: entry.reason,
          })),
        };
      }),
  );
}
