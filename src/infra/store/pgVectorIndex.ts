import pg from "pg";
import { ConfigurationError } from "../../domain/errors.js";
import { EmbeddingRecord, QueryMatch } from "../../domain/types.js";
import { QueryFilter, VectorIndex } from "../../domain/vectorIndex.js";
import { parseVectorLiteral, toVectorLiteral } from "../../utils/vector.js";
import { toStoreError, withTransaction } from "../db/postgres.js";
import { vectorMetadataSchema } from "./schemas.js";

interface PgMatchRow {
  chunk_id: string;
  content: string;
  metadata: unknown;
  score: number | string;
}

export class PgVectorIndex implements VectorIndex {
  private initialized = false;

  constructor(
    private readonly pool: pg.Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.run(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.run(`
      CREATE TABLE IF NOT EXISTS embeddings (
        chunk_id TEXT PRIMARY KEY,
        source_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_embeddings_source_id ON embeddings(source_id)`);
    await this.run(`
      CREATE INDEX IF NOT EXISTS idx_embeddings_vector
      ON embeddings USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    const stored = await this.storedDimension();
    if (stored !== null && stored !== this.vectorDimension) {
      throw new ConfigurationError(
        `embeddings table has dimension ${stored} but VECTOR_DIMENSION=${this.vectorDimension}.`,
        { stored, configured: this.vectorDimension },
      );
    }

    this.initialized = true;
  }

  async upsert(records: EmbeddingRecord[]): Promise<void> {
    await this.initialize();
    if (records.length === 0) {
      return;
    }
    for (const record of records) {
      this.assertDimension(record.vector);
    }

    await withTransaction(this.pool, async (client) => {
      for (const record of records) {
        await insertRecord(client, record);
      }
    });
  }

  async replaceSource(sourceId: string, records: EmbeddingRecord[]): Promise<void> {
    await this.initialize();
    for (const record of records) {
      if (record.metadata.sourceId !== sourceId) {
        throw new ConfigurationError(
          `Record ${record.chunkId} belongs to ${record.metadata.sourceId}, not ${sourceId}.`,
        );
      }
      this.assertDimension(record.vector);
    }

    // readers keep seeing the old rows until the commit
    await withTransaction(this.pool, async (client) => {
      await client.query(`DELETE FROM embeddings WHERE source_id = $1`, [sourceId]);
      for (const record of records) {
        await insertRecord(client, record);
      }
    });
  }

  async deleteBySource(sourceId: string): Promise<number> {
    await this.initialize();
    const result = await this.run(`DELETE FROM embeddings WHERE source_id = $1`, [sourceId]);
    return result.rowCount ?? 0;
  }

  async countBySource(sourceId: string): Promise<number> {
    await this.initialize();
    const result = await this.run<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM embeddings WHERE source_id = $1`,
      [sourceId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async listChunkIds(sourceId: string): Promise<string[]> {
    await this.initialize();
    const result = await this.run<{ chunk_id: string }>(
      `SELECT chunk_id FROM embeddings WHERE source_id = $1 ORDER BY chunk_id ASC`,
      [sourceId],
    );
    return result.rows.map((row) => row.chunk_id);
  }

  async query(vector: number[], topK: number, filter: QueryFilter = {}): Promise<QueryMatch[]> {
    await this.initialize();
    if (topK <= 0) {
      return [];
    }
    this.assertDimension(vector);

    const result = await this.run<PgMatchRow>(
      `
        SELECT
          chunk_id,
          content,
          metadata,
          (1 - (embedding <=> $1::vector)) AS score
        FROM embeddings
        WHERE ($2::text[] IS NULL OR source_id = ANY($2::text[]))
        ORDER BY embedding <=> $1::vector ASC, position ASC, chunk_id ASC
        LIMIT $3
      `,
      [toVectorLiteral(vector), filter.sourceIds ?? null, topK],
    );

    return result.rows.map((row) => ({
      chunkId: row.chunk_id,
      score: Number(row.score),
      text: row.content,
      metadata: vectorMetadataSchema.parse(row.metadata),
    }));
  }

  async dimension(): Promise<number> {
    return this.vectorDimension;
  }

  async ping(): Promise<void> {
    await this.run("SELECT 1");
  }

  private async storedDimension(): Promise<number | null> {
    const result = await this.run<{ embedding: string }>(
      `SELECT embedding::text AS embedding FROM embeddings LIMIT 1`,
    );
    const row = result.rows[0];
    return row ? parseVectorLiteral(row.embedding).length : null;
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.vectorDimension) {
      throw new ConfigurationError(
        `Vector dimension ${vector.length} does not match index dimension ${this.vectorDimension}.`,
        { expected: this.vectorDimension, actual: vector.length },
      );
    }
  }

  private async run<R extends pg.QueryResultRow = pg.QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(sql, params);
    } catch (error) {
      throw toStoreError(error);
    }
  }
}

async function insertRecord(client: pg.PoolClient, record: EmbeddingRecord): Promise<void> {
  await client.query(
    `
      INSERT INTO embeddings (chunk_id, source_id, position, content, metadata, embedding)
      VALUES ($1, $2, $3, $4, $5::jsonb, $6::vector)
      ON CONFLICT (chunk_id)
      DO UPDATE SET
        source_id = EXCLUDED.source_id,
        position = EXCLUDED.position,
        content = EXCLUDED.content,
        metadata = EXCLUDED.metadata,
        embedding = EXCLUDED.embedding
    `,
    [
      record.chunkId,
      record.metadata.sourceId,
      record.metadata.position,
      record.text,
      JSON.stringify(record.metadata),
      toVectorLiteral(record.vector),
    ],
  );
}
