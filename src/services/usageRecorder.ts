import pg from "pg";
import { logger } from "../config/logger.js";

const { Pool } = pg;

// ── Types ───────────────────────────────────────────────────────────────────

export type UsageStatus = "success" | "error" | "cancelled";

export interface UsageRecord {
  requestId: string;
  stream: boolean;
  clientModel: string;
  backendModel: string;
  baseUrl: string;
  apiType: string;
  inputTokens: number;
  outputTokens: number;
  cacheReadInputTokens: number;
  latencyMs: number;
  status: UsageStatus;
  error?: string;
}

export interface UsageRecorder {
  record(entry: UsageRecord): Promise<void>;
  close(): Promise<void>;
}

/** The slice of pg.Pool the recorder needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

// ── Postgres-backed ledger ──────────────────────────────────────────────────

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS usage_log (
    id                       BIGSERIAL   PRIMARY KEY,
    created_at               TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    request_id               TEXT        NOT NULL,
    is_stream                BOOLEAN     NOT NULL,
    client_model             TEXT        NOT NULL,
    backend_model            TEXT        NOT NULL,
    base_url                 TEXT        NOT NULL,
    api_type                 TEXT        NOT NULL,
    input_tokens             INTEGER     NOT NULL,
    output_tokens            INTEGER     NOT NULL,
    cache_read_input_tokens  INTEGER     NOT NULL,
    total_tokens             INTEGER     NOT NULL,
    latency_ms               INTEGER     NOT NULL,
    status                   TEXT        NOT NULL,
    error                    TEXT
  )
`;

const INSERT_SQL = `
  INSERT INTO usage_log (
    request_id, is_stream, client_model, backend_model, base_url, api_type,
    input_tokens, output_tokens, cache_read_input_tokens, total_tokens,
    latency_ms, status, error
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
`;

export class PgUsageRecorder implements UsageRecorder {
  private ready: Promise<void> | null = null;

  constructor(private readonly client: SqlClient) {}

  private ensureTable(): Promise<void> {
    if (!this.ready) {
      this.ready = this.client.query(CREATE_TABLE_SQL).then(() => undefined);
      // A failed attempt is retried on the next record.
      this.ready.catch(() => {
        this.ready = null;
      });
    }
    return this.ready;
  }

  async record(entry: UsageRecord): Promise<void> {
    await this.ensureTable();
    await this.client.query(INSERT_SQL, [
      entry.requestId,
      entry.stream,
      entry.clientModel,
      entry.backendModel,
      entry.baseUrl,
      entry.apiType,
      entry.inputTokens,
      entry.outputTokens,
      entry.cacheReadInputTokens,
      entry.inputTokens + entry.outputTokens,
      entry.latencyMs,
      entry.status,
      entry.error ?? null,
    ]);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export const noopUsageRecorder: UsageRecorder = {
  async record() {},
  async close() {},
};

export function createUsageRecorder(databaseUrl: string | undefined): UsageRecorder {
  if (!databaseUrl) return noopUsageRecorder;

  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
  pool.on("error", (err) => {
    logger.error({ action: "db_pool_error", error: err.message });
  });
  return new PgUsageRecorder(pool);
}

/** Fire-and-forget write; failures are logged. */
export function recordUsage(recorder: UsageRecorder, entry: UsageRecord): void {
  recorder.record(entry).catch((err: unknown) => {
    logger.warn({
      action: "usage_record_failed",
      requestId: entry.requestId,
      error: err instanceof Error ? err.message : String(err),
    });
  });
}
