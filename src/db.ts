import { Pool } from "pg";
import type { DatabaseConfig } from "./config/env";
import type { ConsultationLog, ConsultationLogEntry } from "./types";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool(config);
  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", error);
  });
  return pool;
}

export class PgConsultationLog implements ConsultationLog {
  constructor(private readonly db: Queryable) {}

  async init(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS consultation_logs (
        id SERIAL PRIMARY KEY,
        created_at TIMESTAMPTZ DEFAULT NOW(),
        query TEXT NOT NULL,
        outcome TEXT NOT NULL,
        reason TEXT,
        answer TEXT NOT NULL,
        search_queries TEXT[] NOT NULL,
        attempts INTEGER NOT NULL
      );
    `);
  }

  async record({ query, response }: ConsultationLogEntry): Promise<void> {
    const values = [
      query,
      response.outcome,
      response.reason ?? null,
      response.text,
      response.searchQueries,
      response.attempts
    ];

    await this.db.query(
      `INSERT INTO consultation_logs (query, outcome, reason, answer, search_queries, attempts)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      values
    );
  }
}
