import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { registerAskWithCitationsTool } from "./askWithCitations.js";
import { registerDeleteSourceTool } from "./deleteSource.js";
import { registerGetSourceStatusTool } from "./getSourceStatus.js";
import { registerHealthCheckTool } from "./healthCheck.js";
import { registerListSourcesTool } from "./listSources.js";
import { registerRetryFailedSourcesTool } from "./retryFailedSources.js";
import { registerSubmitSourceTool } from "./submitSource.js";

export function registerTools(server: McpServer, service: KnowledgeBaseService) {
  registerHealthCheckTool(server, service);
  registerSubmitSourceTool(server, service);
  registerGetSourceStatusTool(server, service);
  registerListSourcesTool(server, service);
  registerDeleteSourceTool(server, service);
  registerAskWithCitationsTool(server, service);
  registerRetryFailedSourcesTool(server, service);
}
