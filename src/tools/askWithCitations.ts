import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { KnowledgeBaseService } from "../services/knowledgeBaseService.js";
import { runTool } from "./toolResult.js";
import { parseQueryRequest, queryFields, toAnswerView } from "./wire.js";

export function registerAskWithCitationsTool(server: McpServer, service: KnowledgeBaseService) {
  server.registerTool(
    "ask_with_citations",
    {
      title: "Ask With Citations",
      description:
        "Answers a question from the ingested sources, with numbered citations and the reasoning trace.",
      inputSchema: queryFields,
    },
    async (args, extra) =>
      runTool("ask_with_citations", async () => {
        const input = parseQueryRequest(args);
        const result = await service.query({ ...input, signal: extra.signal });
        return toAnswerView(result);
      }),
  );
}
