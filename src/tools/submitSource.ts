import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";
import { parseSubmitRequest, submitSourceFields } from "./wire.js";

export function registerSubmitSourceTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "submit_source",
    {
      title: "Submit Source",
      description:
        "Queues a document (local path or base64 upload), web page or video for ingestion. " +
        "Returns immediately; poll get_source_status for progress.",
      inputSchema: submitSourceFields,
    },
    async (args) =>
      runTool("submit_source", async () => {
        const result = await service.submitSource(parseSubmitRequest(args));
        return { source_id: result.sourceId, status: result.status, queued: result.queued };
      }),
  );
}
