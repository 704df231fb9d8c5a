import test from 'node:test';
import assert from 'node:assert/strict';
import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';

import { chunkRows, INSERT_CHUNK_ROWS, KyselyScanStore } from '../server/data/scanStore.js';
import type { SymbolResultWrite } from '../server/data/scanStoreTypes.js';
import type { Database } from '../server/db/types.js';

/** Driver that records compiled statements instead of talking to Postgres. */
class RecordingDriver implements Driver {
  readonly statements: Array<{ sql: string; parameterCount: number }> = [];
  readonly transactions: string[] = [];

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    const statements = this.statements;
    return {
      async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
        statements.push({ sql: compiledQuery.sql, parameterCount: compiledQuery.parameters.length });
        return { rows: [] };
      },
      async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {},
    };
  }

  async beginTransaction(): Promise<void> {
    this.transactions.push('begin');
  }

  async commitTransaction(): Promise<void> {
    this.transactions.push('commit');
  }

  async rollbackTransaction(): Promise<void> {
    this.transactions.push('rollback');
  }

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}

function recordingStore(): { store: KyselyScanStore; driver: RecordingDriver } {
  const driver = new RecordingDriver();
  const db = new Kysely<Database>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });
  return { store: new KyselyScanStore(db), driver };
}

test('chunkRows splits into batches of at most the given size', () => {
  assert.deepEqual(chunkRows([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
  assert.deepEqual(chunkRows([1, 2], 5), [[1, 2]]);
  assert.deepEqual(chunkRows([], 5), []);
});

test('saveScanResults inserts large universes in chunks inside one transaction', async () => {
  const { store, driver } = recordingStore();
  const results: SymbolResultWrite[] = Array.from({ length: INSERT_CHUNK_ROWS * 2 + 500 }, (_, i) => ({
    symbolId: i + 1,
    fundamentals: null,
    technicals: null,
    recommendation: { recommended: false, score: 0, reason: '' },
    log: null,
  }));

  await store.saveScanResults(7, results, new Date('2026-10-16T09:00:00Z'));

  assert.deepEqual(driver.transactions, ['begin', 'commit']);
  assert.equal(driver.statements.length, 3);
  assert.ok(driver.statements.every((statement) => statement.sql.startsWith('insert into "recommendations"')));
  assert.deepEqual(
    driver.statements.map((statement) => statement.parameterCount),
    [6000, 6000, 3000],
  );
});

test('saveScanResults skips tables with nothing to write', async () => {
  const { store, driver } = recordingStore();
  await store.saveScanResults(7, [], new Date('2026-10-16T09:00:00Z'));
  assert.equal(driver.statements.length, 0);
  assert.deepEqual(driver.transactions, ['begin', 'commit']);
});
