/**
 * Document collection backed by a Postgres table of JSONB documents.
 * Each wide record is stored whole; no uniqueness constraint, so re-running a load duplicates rows.
 */

import type { SqlClient } from "@/lib/db";
import type { DocumentCollection, StoreDocument } from "@/load/types";

export class PgDocumentCollection implements DocumentCollection {
  private ensured = false;

  constructor(
    private readonly client: SqlClient,
    readonly table: string
  ) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
  }

  async ping(): Promise<void> {
    await this.client.query("SELECT 1");
  }

  private async ensureTable(): Promise<void> {
    if (this.ensured) return;
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        id bigserial PRIMARY KEY,
        document jsonb NOT NULL,
        loaded_at timestamptz NOT NULL DEFAULT now()
      )`
    );
    this.ensured = true;
  }

  /**
   * One multi-row INSERT per call. Returns the number of rows written.
   */
  async insertMany(documents: readonly StoreDocument[]): Promise<number> {
    if (documents.length === 0) return 0;
    await this.ensureTable();
    const placeholders = documents.map((_, i) => `($${i + 1}::jsonb)`);
    const result = await this.client.query(
      `INSERT INTO ${this.table} (document) VALUES ${placeholders.join(", ")}`,
      documents.map((d) => JSON.stringify(d))
    );
    return result.rowCount ?? 0;
  }
}
