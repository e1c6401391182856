import path from "node:path";
import { AppConfig } from "../../config/env.js";
import { ChunkArtifactStore, UploadStore } from "../../domain/chunkArtifacts.js";
import { ConfigurationError } from "../../domain/errors.js";
import { SourceStore } from "../../domain/sourceStore.js";
import { VectorIndex } from "../../domain/vectorIndex.js";
import { createPostgresPool } from "../db/postgres.js";
import { getLogger } from "../log/logger.js";
import {
  FileChunkArtifactStore,
  FileUploadStore,
  InMemoryChunkArtifactStore,
  InMemoryUploadStore,
} from "./fileStores.js";
import { InMemorySourceStore } from "./inMemorySourceStore.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";
import { PersistentSourceStore } from "./persistentSourceStore.js";
import { PersistentVectorIndex } from "./persistentVectorIndex.js";
import { PgSourceStore } from "./pgSourceStore.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export interface StoresBootstrapResult {
  sourceStore: SourceStore;
  vectorIndex: VectorIndex;
  artifacts: ChunkArtifactStore;
  uploads: UploadStore;
  backend: "memory" | "file" | "pgvector";
  close: () => Promise<void>;
}

const log = getLogger({ module: "stores" });

export async function createStores(config: AppConfig): Promise<StoresBootstrapResult> {
  if (config.enablePgvector) {
    if (!config.databaseUrl) {
      throw new ConfigurationError("DATABASE_URL is required when pgvector is enabled.");
    }
    const pool = createPostgresPool(config.databaseUrl);
    const sourceStore = new PgSourceStore(pool);
    const vectorIndex = new PgVectorIndex(pool, config.vectorDimension);
    await sourceStore.initialize();
    await vectorIndex.initialize();
    log.info({ backend: "pgvector", dimension: config.vectorDimension }, "stores ready");

    return {
      sourceStore,
      vectorIndex,
      artifacts: new FileChunkArtifactStore(path.join(config.dataDir, "chunks")),
      uploads: new FileUploadStore(path.join(config.dataDir, "uploads")),
      backend: "pgvector",
      close: async () => {
        await pool.end();
      },
    };
  }

  if (config.persistInMemoryIndex) {
    const options = { maxBytes: config.maxInMemoryIndexBytes };
    const sourceStore = new PersistentSourceStore(
      path.join(config.dataDir, "sources.json"),
      options,
    );
    const vectorIndex = new PersistentVectorIndex(
      path.join(config.dataDir, "vector-index.json"),
      config.vectorDimension,
      options,
    );
    await sourceStore.initialize();
    await vectorIndex.initialize();
    log.info({ backend: "file", dataDir: config.dataDir }, "stores ready");

    return {
      sourceStore,
      vectorIndex,
      artifacts: new FileChunkArtifactStore(path.join(config.dataDir, "chunks")),
      uploads: new FileUploadStore(path.join(config.dataDir, "uploads")),
      backend: "file",
      close: async () => {
        await sourceStore.close();
        await vectorIndex.close();
      },
    };
  }

  log.info({ backend: "memory" }, "stores ready");
  return {
    sourceStore: new InMemorySourceStore(),
    vectorIndex: new InMemoryVectorIndex(config.vectorDimension),
    artifacts: new InMemoryChunkArtifactStore(),
    uploads: new InMemoryUploadStore(),
    backend: "memory",
    close: async () => {},
  };
}
