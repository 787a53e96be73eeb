import 'dotenv/config';
import { loadConfig } from '../config';
import { closeDb } from '../db';
import { storage } from '../storage';
import { createPipelineDeps, runPipeline } from '../services/pipeline';

/**
 * Single pipeline run. Exit code 0 on success, 1 on failure.
 */
async function main() {
  try {
    await runPipeline(createPipelineDeps(loadConfig(), storage));
  } finally {
    await closeDb();
  }
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('[ERROR]', err);
    process.exit(1);
  });
