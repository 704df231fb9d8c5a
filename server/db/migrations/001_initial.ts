import { Kysely, sql } from 'kysely';

// Migrations run against whatever schema exists at the time, not the current Database type.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('symbols')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('symbol', 'varchar(32)', (col) => col.notNull().unique())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  await db.schema
    .createTable('scans')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('started_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addColumn('finished_at', 'timestamptz')
    .addColumn('status', 'varchar(20)', (col) => col.notNull().defaultTo('running'))
    .addColumn('error_message', 'text')
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_scans_status ON scans (status)`.execute(db);

  await db.schema
    .createTable('fundamentals')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('scan_id', 'integer', (col) => col.notNull().references('scans.id').onDelete('cascade'))
    .addColumn('symbol_id', 'integer', (col) => col.notNull().references('symbols.id').onDelete('cascade'))
    .addColumn('name', 'varchar(256)')
    .addColumn('cmp', 'double precision')
    .addColumn('pe', 'double precision')
    .addColumn('roce', 'double precision')
    .addColumn('bv', 'double precision')
    .addColumn('debt', 'double precision')
    .addColumn('industry', 'varchar(256)')
    .addColumn('fetched_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addUniqueConstraint('uq_fundamentals_scan_symbol', ['scan_id', 'symbol_id'])
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_fundamentals_symbol_fetched ON fundamentals (symbol_id, fetched_at DESC)`.execute(
    db,
  );

  await db.schema
    .createTable('technicals')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('scan_id', 'integer', (col) => col.notNull().references('scans.id').onDelete('cascade'))
    .addColumn('symbol_id', 'integer', (col) => col.notNull().references('symbols.id').onDelete('cascade'))
    .addColumn('rsi14', 'double precision')
    .addColumn('macd', 'double precision')
    .addColumn('macd_signal', 'double precision')
    .addColumn('sma20', 'double precision')
    .addColumn('close', 'double precision')
    .addColumn('signals_json', 'text', (col) => col.notNull())
    .addColumn('price_series_json', 'text', (col) => col.notNull())
    .addColumn('rsi_series_json', 'text', (col) => col.notNull())
    .addColumn('macd_series_json', 'text', (col) => col.notNull())
    .addColumn('history_source', 'varchar(16)')
    .addColumn('computed_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addUniqueConstraint('uq_technicals_scan_symbol', ['scan_id', 'symbol_id'])
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_technicals_symbol_computed ON technicals (symbol_id, computed_at DESC)`.execute(
    db,
  );

  await db.schema
    .createTable('recommendations')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('scan_id', 'integer', (col) => col.notNull().references('scans.id').onDelete('cascade'))
    .addColumn('symbol_id', 'integer', (col) => col.notNull().references('symbols.id').onDelete('cascade'))
    .addColumn('recommended', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('score', 'double precision', (col) => col.notNull().defaultTo(0))
    .addColumn('reason', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addUniqueConstraint('uq_recommendations_scan_symbol', ['scan_id', 'symbol_id'])
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_recommendations_scan_score ON recommendations (scan_id, score DESC)`.execute(
    db,
  );

  await db.schema
    .createTable('scan_logs')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('scan_id', 'integer', (col) => col.notNull().references('scans.id').onDelete('cascade'))
    .addColumn('symbol_id', 'integer', (col) => col.references('symbols.id').onDelete('cascade'))
    .addColumn('status', 'varchar(16)', (col) => col.notNull())
    .addColumn('message', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_scan_logs_scan ON scan_logs (scan_id, created_at)`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('scan_logs').ifExists().execute();
  await db.schema.dropTable('recommendations').ifExists().execute();
  await db.schema.dropTable('technicals').ifExists().execute();
  await db.schema.dropTable('fundamentals').ifExists().execute();
  await db.schema.dropTable('scans').ifExists().execute();
  await db.schema.dropTable('symbols').ifExists().execute();
}
