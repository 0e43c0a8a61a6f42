/**
 * Loads the product file into the Postgres catalog and publishes a fresh index.
 * Usage: DATABASE_URL=postgres://... npm run ingest [-- path/to/products.json]
 */

import { Pool } from 'pg';
import { loadConfig } from '../config/app-config';
import { PostgresCatalogStore } from '../catalog/postgres-catalog-store';
import { describeError } from '../core/errors';
import { createEmbedder } from '../embedding/create-embedder';
import { IngestionPipeline, type IngestionReport } from '../ingestion/ingestion-pipeline';
import { JsonFileProductSource } from '../ingestion/product-source';
import { StructuredAuditLogger } from '../observability/audit-logger';
import { indexSpecFor } from '../server/container';

export function formatReport(report: IngestionReport): string {
  const lines = [
    `Source: ${report.source}`,
    `Status: ${report.status}`,
    `Loaded: ${report.loaded}`,
    `Succeeded: ${report.succeeded.length}`,
    `Failed: ${report.failed.length}`
  ];
  for (const failure of report.failed) {
    lines.push(`  - [${failure.stage}] ${failure.productId ?? '-'}: ${failure.error}`);
  }
  if (report.index) {
    lines.push(`Index: ${report.index.records} records in ${report.index.clusters} clusters`);
  }
  lines.push(`Duration: ${report.durationMs}ms`);
  return lines.join('\n');
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const config = loadConfig();
  if (!config.databaseUrl) {
    console.error('[ERROR] DATABASE_URL is required. Without it the server loads CATALOG_FILE into memory at startup.');
    return 1;
  }

  const catalogFile = argv[0] ?? config.catalogFile;
  const embedder = await createEmbedder(config.embedding);
  const pool = new Pool({ connectionString: config.databaseUrl });
  const store = new PostgresCatalogStore(pool, { nprobe: config.index.nprobe, nlist: config.index.nlist });

  try {
    const report = await new IngestionPipeline({
      store,
      embedder,
      source: new JsonFileProductSource(catalogFile),
      dimension: config.embedding.dimension,
      indexSpec: indexSpecFor(config),
      batchSize: config.ingestBatchSize,
      auditLogger: new StructuredAuditLogger()
    }).run();

    console.log(formatReport(report));
    return report.status === 'published' ? 0 : 1;
  } finally {
    await store.close();
    await pool.end();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`[ERROR] Ingestion failed: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
