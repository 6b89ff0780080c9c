/**
 * Destination Schema Model
 *
 * Mirrors every table of the destination SQLite database: columns in
 * declaration order, primary keys and foreign keys. The database is
 * opened read-only and closed before load() returns; nothing is written
 * through this connection.
 */
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { sql } from 'drizzle-orm';
import { logger } from '@reseed/core';
import { SchemaUnavailableError } from './errors';
import type { Column, ColumnType, ForeignKey, SchemaModel, TableDefinition } from './types';

interface MasterRow {
  name: string;
  sql: string | null;
}

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

interface ForeignKeyRow {
  id: number;
  seq: number;
  table: string;
  from: string;
  to: string | null;
}

/**
 * Map a declared column type to its SQLite affinity.
 * Rules are checked in this order, as SQLite does.
 */
export function columnAffinity(declaredType: string): ColumnType {
  const t = declaredType.toUpperCase();
  if (t.includes('INT')) return 'integer';
  if (t.includes('CHAR') || t.includes('CLOB') || t.includes('TEXT')) return 'text';
  if (t === '' || t.includes('BLOB')) return 'blob';
  if (t.includes('REAL') || t.includes('FLOA') || t.includes('DOUB')) return 'real';
  return 'numeric';
}

export function loadSchema(location: string): SchemaModel {
  let client: Database.Database;
  try {
    client = new Database(location, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new SchemaUnavailableError(location, err);
  }

  try {
    const db = drizzle(client);
    const masters = db.all<MasterRow>(sql`
      SELECT name, sql FROM sqlite_master
      WHERE type = 'table'
      ORDER BY name
    `);

    const raw = new Map<string, { columns: Column[]; foreignKeys: ForeignKey[]; hasSequence: boolean }>();
    for (const master of masters) {
      const createSql = master.sql ?? '';
      const withoutRowid = /\bWITHOUT\s+ROWID\b/i.test(createSql);

      const info = db.all<TableInfoRow>(sql`
        SELECT cid, name, type, "notnull", dflt_value, pk
        FROM pragma_table_info(${master.name})
        ORDER BY cid
      `);
      const pkCount = info.filter((c) => c.pk > 0).length;

      const columns: Column[] = info.map((c) => ({
        name: c.name,
        declaredType: c.type,
        type: columnAffinity(c.type),
        position: c.cid,
        notNull: c.notnull === 1,
        defaultValue: c.dflt_value,
        primaryKey: c.pk > 0,
        autoincrement:
          c.pk > 0 && pkCount === 1 && !withoutRowid && c.type.toUpperCase() === 'INTEGER',
      }));

      const fkRows = db.all<ForeignKeyRow>(sql`
        SELECT id, seq, "table", "from", "to"
        FROM pragma_foreign_key_list(${master.name})
        ORDER BY id, seq
      `);
      const foreignKeys: ForeignKey[] = fkRows.map((fk) => ({
        column: fk.from,
        referencedTable: fk.table,
        referencedColumn: fk.to,
      }));

      raw.set(master.name, {
        columns,
        foreignKeys,
        hasSequence: /\bAUTOINCREMENT\b/i.test(createSql),
      });
    }

    const tables = new Map<string, TableDefinition>();
    for (const [name, def] of raw) {
      const foreignKeys = def.foreignKeys.filter((fk) => {
        if (raw.has(fk.referencedTable)) return true;
        logger.warn('Ignoring foreign key to unknown table', {
          table: name,
          column: fk.column,
          referencedTable: fk.referencedTable,
        });
        return false;
      });
      tables.set(name, { name, columns: def.columns, foreignKeys, hasSequence: def.hasSequence });
    }

    logger.debug('Schema loaded', { location, tableCount: tables.size });
    return { tables };
  } catch (err) {
    throw new SchemaUnavailableError(location, err);
  } finally {
    client.close();
  }
}

// ── Lookups ──────────────────────────────────────────────────────

/** The autoincrement-style key column, or null when the table has none */
export function surrogateKeyColumn(table: TableDefinition): Column | null {
  return table.columns.find((c) => c.autoincrement) ?? null;
}

/** Primary key column a foreign key points at, resolving implicit references */
export function referencedColumnName(schema: SchemaModel, fk: ForeignKey): string | null {
  if (fk.referencedColumn) return fk.referencedColumn;
  const target = schema.tables.get(fk.referencedTable);
  const pk = target?.columns.filter((c) => c.primaryKey) ?? [];
  return pk.length === 1 && pk[0] ? pk[0].name : null;
}

export interface RelationshipLine {
  table: string;
  column: string;
  referencedTable: string;
  referencedColumn: string | null;
}

/** All foreign keys, tables sorted by name, constraints in schema order */
export function listRelationships(schema: SchemaModel): RelationshipLine[] {
  const lines: RelationshipLine[] = [];
  const names = [...schema.tables.keys()].sort();
  for (const name of names) {
    const table = schema.tables.get(name);
    if (!table) continue;
    for (const fk of table.foreignKeys) {
      lines.push({
        table: name,
        column: fk.column,
        referencedTable: fk.referencedTable,
        referencedColumn: referencedColumnName(schema, fk),
      });
    }
  }
  return lines;
}
