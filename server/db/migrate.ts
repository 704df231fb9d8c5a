import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Migrator, FileMigrationProvider, Kysely } from 'kysely';
import type { Database } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export async function runMigrations(db: Kysely<Database>): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      // The migrations folder sits next to this file
      migrationFolder: path.join(__dirname, 'migrations'),
    }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((it) => {
    if (it.status === 'Success') {
      console.log(`[db] migration "${it.migrationName}" applied`);
    } else if (it.status === 'Error') {
      console.error(`[db] migration "${it.migrationName}" failed`);
    }
  });

  if (error) {
    console.error('[db] migrations failed');
    throw error;
  }
}
