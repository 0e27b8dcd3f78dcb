/**
 * Store surface used by the load stage. Any document store can implement it;
 * the shipped one is PgDocumentCollection.
 */

export type StoreDocument = Readonly<Record<string, unknown>>;

export interface DocumentCollection {
  /** Liveness probe. Rejects when the store is unreachable. */
  ping(): Promise<void>;
  /** Insert documents in one request; resolves to the number written. */
  insertMany(documents: readonly StoreDocument[]): Promise<number>;
}

export interface LoadResult {
  ok: boolean;
  inserted: number;
  batches: number;
  error?: string;
}
