/* eslint-disable no-console */
import 'dotenv/config';
import { getLoaderConfig } from '../src/config/loaderConfig';
import { createPgExecutor, createPool } from '../src/db';
import { runUseeioLoad } from '../src/loader/useeioLoad';
import { describeMethodology, getActiveModelMetadata } from '../src/services/modelMetadata.service';

async function main() {
  const config = getLoaderConfig();
  const pool = createPool(config.databaseUrl);
  try {
    const db = createPgExecutor(pool);
    if (config.modelVersionDerived) {
      console.warn(`[load:useeio] USEEIO_MODEL_VERSION not set; using "${config.modelVersion}" from the export directory name`);
    }
    await runUseeioLoad(db, {
      exportDir: config.exportDir,
      modelVersion: config.modelVersion,
      batchSize: config.batchSize
    });
    const active = await getActiveModelMetadata(db);
    if (active) {
      console.log(`[load:useeio] ${describeMethodology(active)}`);
    }
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error('[load:useeio] Failed:', error);
  process.exit(1);
});
