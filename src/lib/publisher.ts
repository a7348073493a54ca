// src/lib/publisher.ts
import { PublishSchemaError } from './errors';
import { ID_COLUMNS, reshape } from './reshape';
import type { PublishResult, StoreClient, SubjectAggregate, WideAttendanceTable } from '../types';

export interface PublishOptions {
  // Pause after DDL so the REST layer picks up the new schema.
  schemaSettleMs: number;
}

const POLICY_NAME = 'Allow public access';

const delay = (ms: number) => new Promise((res) => setTimeout(res, ms));

export function sanitizeTableName(name: string): string {
  return name
    .replace(/[^a-zA-Z0-9_]/g, '_')
    .replace(/__+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createTableSql(tableName: string, columns: string[]): string {
  const definitions = columns.map((column) =>
    column === ID_COLUMNS[0] ? `${quoteIdent(column)} TEXT PRIMARY KEY` : `${quoteIdent(column)} TEXT`
  );
  return `CREATE TABLE public.${quoteIdent(tableName)} (${definitions.join(', ')});`;
}

async function recreateTable(store: StoreClient, tableName: string, table: WideAttendanceTable, options: PublishOptions) {
  const target = `public.${quoteIdent(tableName)}`;
  console.log(`    -> Recreating table '${tableName}' for a fresh upload...`);
  try {
    await store.executeStatement(`DROP TABLE IF EXISTS ${target};`);
    console.log(`    -> Table '${tableName}' dropped.`);

    await store.executeStatement(createTableSql(tableName, table.columns));
    console.log(`    -> Table '${tableName}' created with fresh schema.`);

    await store.executeStatement(`ALTER TABLE ${target} ENABLE ROW LEVEL SECURITY;`);
    await store.executeStatement(
      `DROP POLICY IF EXISTS ${quoteIdent(POLICY_NAME)} ON ${target}; ` +
        `CREATE POLICY ${quoteIdent(POLICY_NAME)} ON ${target} FOR ALL USING (true) WITH CHECK (true);`
    );
    console.log('    -> RLS and policy applied.');
  } catch (error) {
    console.error(`    -> ❌ FAILED to create table or apply policy for '${tableName}'.`);
    throw new PublishSchemaError(tableName, error);
  }

  if (options.schemaSettleMs > 0) {
    console.log(`    -> Waiting ${options.schemaSettleMs / 1000}s for schema cache to refresh...`);
    await delay(options.schemaSettleMs);
  }
}

/**
 * Replaces the subject's table wholesale: drop, create, open policy, insert.
 *
 * Schema failures throw a PublishSchemaError. An insert failure is logged
 * and reported through `inserted: false`; the freshly created table is left
 * as it is.
 */
export async function publish(
  store: StoreClient,
  subject: string,
  table: WideAttendanceTable,
  options: PublishOptions
): Promise<PublishResult> {
  const tableName = sanitizeTableName(subject);
  console.log(`\n======= UPLOADING TO TABLE: ${tableName} =======`);

  await recreateTable(store, tableName, table, options);

  const rows = table.rows.map((row) => {
    const complete: Record<string, string | null> = {};
    for (const column of table.columns) {
      complete[column] = row[column] ?? null;
    }
    return complete;
  });

  console.log(`    -> Inserting ${rows.length} records into '${tableName}'...`);
  try {
    await store.insertRows(tableName, rows);
    console.log(`    -> ✅ Successfully saved data for '${subject}'.`);
    return { subject, tableName, rowCount: rows.length, inserted: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`    -> ❌ FAILED to save data for '${subject}'. Error: ${message}`);
    return { subject, tableName, rowCount: rows.length, inserted: false };
  }
}

/**
 * Publishes every subject in aggregate order. A subject without dated
 * records is skipped; a subject whose schema step fails is logged and the
 * next one is still attempted.
 */
export async function publishAll(
  store: StoreClient,
  aggregate: SubjectAggregate,
  options: PublishOptions
): Promise<PublishResult[]> {
  const results: PublishResult[] = [];

  for (const [subject, records] of aggregate) {
    if (records.length === 0) {
      console.warn(`No records for '${subject}', skipping.`);
      continue;
    }

    const table = reshape(records);
    if (!table) {
      console.warn(`    -> No attendance dates found for '${subject}', skipping.`);
      continue;
    }

    try {
      results.push(await publish(store, subject, table, options));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`>>> Publishing '${subject}' aborted: ${message}`);
    }
  }

  return results;
}
