import pg from "pg";
import {
  SourcePatch,
  SourceStore,
  applyStatusUpdate,
} from "../../domain/sourceStore.js";
import { Source, SourceStatus } from "../../domain/types.js";
import { toStoreError, withTransaction } from "../db/postgres.js";
import { sourceSchema } from "./schemas.js";

interface PgSourceRow {
  source_id: string;
  record: unknown;
}

/**
 * Sources as one JSONB document per row. A status update locks the row so the
 * transition check and the write see the same record.
 */
export class PgSourceStore implements SourceStore {
  private initialized = false;

  constructor(private readonly pool: pg.Pool) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.run(`
      CREATE TABLE IF NOT EXISTS sources (
        source_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL,
        record JSONB NOT NULL
      )
    `);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_sources_status ON sources(status)`);
    this.initialized = true;
  }

  async put(source: Source): Promise<void> {
    await this.initialize();
    await this.run(
      `
        INSERT INTO sources (source_id, status, created_at, record)
        VALUES ($1, $2, $3, $4::jsonb)
        ON CONFLICT (source_id)
        DO UPDATE SET status = EXCLUDED.status, created_at = EXCLUDED.created_at, record = EXCLUDED.record
      `,
      [source.sourceId, source.status, source.createdAt, JSON.stringify(source)],
    );
  }

  async get(sourceId: string): Promise<Source | null> {
    await this.initialize();
    const result = await this.run<PgSourceRow>(
      `SELECT source_id, record FROM sources WHERE source_id = $1`,
      [sourceId],
    );
    const row = result.rows[0];
    return row ? sourceSchema.parse(row.record) : null;
  }

  async list(): Promise<Source[]> {
    await this.initialize();
    const result = await this.run<PgSourceRow>(
      `SELECT source_id, record FROM sources ORDER BY created_at ASC, source_id ASC`,
    );
    return result.rows.map((row) => sourceSchema.parse(row.record));
  }

  async updateStatus(
    sourceId: string,
    status: SourceStatus,
    patch?: SourcePatch,
  ): Promise<Source> {
    await this.initialize();
    return withTransaction(this.pool, async (client) => {
      const current = await client.query<PgSourceRow>(
        `SELECT source_id, record FROM sources WHERE source_id = $1 FOR UPDATE`,
        [sourceId],
      );
      const row = current.rows[0];
      const next = applyStatusUpdate(
        row ? sourceSchema.parse(row.record) : null,
        sourceId,
        status,
        patch,
      );
      await client.query(
        `UPDATE sources SET status = $2, record = $3::jsonb WHERE source_id = $1`,
        [sourceId, next.status, JSON.stringify(next)],
      );
      return next;
    });
  }

  async delete(sourceId: string): Promise<boolean> {
    await this.initialize();
    const result = await this.run(`DELETE FROM sources WHERE source_id = $1`, [sourceId]);
    return (result.rowCount ?? 0) > 0;
  }

  async ping(): Promise<void> {
    await this.run("SELECT 1");
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
