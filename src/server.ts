#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config/env.js";
import { MCP_PATH, startHttpServer } from "./http/httpServer.js";
import { createAiProviders } from "./infra/ai/createAiProviders.js";
import { createExtractors } from "./infra/extractors/registry.js";
import { getLogger } from "./infra/log/logger.js";
import { createStores } from "./infra/store/createStores.js";
import { KnowledgeBaseService } from "./services/knowledgeBaseService.js";
import { registerTools } from "./tools/index.js";

const SERVER_NAME = "grounded-kb";
const SERVER_VERSION = "0.1.0";

const log = getLogger({ module: "server" });

async function main() {
  const config = loadConfig();
  const providers = createAiProviders(config);
  const stores = await createStores(config);
  const shutdownTasks: Array<() => Promise<void>> = [stores.close];

  const service = new KnowledgeBaseService(
    {
      ...stores,
      extractors: createExtractors({ fetchTimeoutMs: config.providerTimeoutMs }),
      embedding: providers.embedding,
      generation: providers.generation,
    },
    config,
  );
  await service.start();
  // let queued ingestions settle before the stores close
  shutdownTasks.unshift(() => service.whenIdle());

  const createAppServer = () => {
    const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
    registerTools(server, service);
    return server;
  };

  if (config.transport === "http") {
    const http = await startHttpServer({
      host: config.host,
      port: config.port,
      service,
      serverFactory: createAppServer,
    });
    shutdownTasks.unshift(http.close);
    log.info(
      { url: `http://${config.host}:${http.port}${MCP_PATH}`, backend: stores.backend },
      "MCP HTTP server listening",
    );
  } else {
    await createAppServer().connect(new StdioServerTransport());
    log.info({ backend: stores.backend }, "MCP stdio server ready");
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, "shutting down");
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error({ err: error }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "failed to start MCP server");
  process.exit(1);
});
