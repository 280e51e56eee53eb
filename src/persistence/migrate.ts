// pattern: Imperative Shell

import { loadConfig } from '../config/config.ts';
import { createPostgresProvider } from './postgres.ts';

async function main(): Promise<number> {
  const config = loadConfig(process.env['CONFIG_PATH']);
  const db = createPostgresProvider(config.database);

  try {
    await db.connect();
    console.log('[migrate] connected to database');

    const applied = await db.runMigrations();
    console.log(`[migrate] ${applied.length} migration(s) applied`);
    return 0;
  } catch (error) {
    console.error('[migrate] migration failed:', error);
    return 1;
  } finally {
    await db.disconnect();
  }
}

process.exitCode = await main();
