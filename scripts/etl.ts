// Entry point: runs the whole pipeline once with default file names.
// Usage: npm run etl   (DATABASE_URL from the environment or .env)

import "dotenv/config";
import { loadConfig } from "@/lib/config";
import { closePool, poolClient } from "@/lib/db";
import { PgDocumentCollection } from "@/load/pgDocumentCollection";
import { runPipeline } from "@/pipeline/run";

async function main(): Promise<void> {
  const config = loadConfig();
  try {
    const result = await runPipeline(config, {
      openCollection: () => new PgDocumentCollection(poolClient(), config.table),
    });
    if (!result.load.ok) {
      console.warn("[etl] load stage aborted:", result.load.error);
    }
  } finally {
    await closePool();
  }
}

main().catch((err: unknown) => {
  console.error("[etl]", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
