import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";

export function registerHealthCheckTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Reports the status of the vector index, source store and AI providers.",
      inputSchema: {},
    },
    async () => runTool("health_check", () => service.health()),
  );
}
