import 'dotenv/config';
import { closeDb, getPool } from '../db';

async function main() {
  const client = await getPool().connect();
  try {
    console.log('[SQL] Creating table listings if not exists...');
    await client.query(`
      CREATE TABLE IF NOT EXISTS listings (
        listing_key text PRIMARY KEY,
        external_id text,
        url text NOT NULL UNIQUE,
        title text NOT NULL,
        asking_price double precision,
        gross_revenue text,
        established text,
        cashflow text,
        description text,
        category jsonb DEFAULT '[]'::jsonb NOT NULL,
        original_category text,
        city text,
        state text,
        broker_name text,
        broker_profile_url text,
        broker_phone text,
        scraped_at timestamptz NOT NULL
      );
    `);

    console.log('[SQL] Creating indexes...');
    await client.query(`CREATE INDEX IF NOT EXISTS listings_external_id_idx ON listings (external_id);`);
    await client.query(`CREATE INDEX IF NOT EXISTS listings_scraped_at_idx ON listings (scraped_at);`);

    console.log('[DONE] Migration completed.');
  } finally {
    client.release();
    await closeDb();
  }
}

main().catch((err) => {
  console.error('[ERROR]', err);
  process.exit(1);
});
