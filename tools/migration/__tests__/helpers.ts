import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { columnAffinity } from '../schema';
import type { Column, ForeignKey, SchemaModel, TableDefinition } from '../types';

// ── In-memory schema builders ─────────────────────────────────────

export interface ColumnSpec {
  name: string;
  type?: string;
  pk?: boolean;
  notNull?: boolean;
  default?: string;
}

/** Build a table; a lone INTEGER pk column is treated as autoincrement-style */
export function table(
  name: string,
  columns: ColumnSpec[],
  foreignKeys: Array<[column: string, referencedTable: string, referencedColumn?: string]> = [],
  options: { hasSequence?: boolean } = {},
): TableDefinition {
  const pkCount = columns.filter((c) => c.pk).length;
  const cols: Column[] = columns.map((c, position) => {
    const declaredType = c.type ?? 'TEXT';
    return {
      name: c.name,
      declaredType,
      type: columnAffinity(declaredType),
      position,
      notNull: c.notNull ?? false,
      defaultValue: c.default ?? null,
      primaryKey: c.pk ?? false,
      autoincrement: (c.pk ?? false) && pkCount === 1 && declaredType.toUpperCase() === 'INTEGER',
    };
  });
  const fks: ForeignKey[] = foreignKeys.map(([column, referencedTable, referencedColumn]) => ({
    column,
    referencedTable,
    referencedColumn: referencedColumn ?? null,
  }));
  return { name, columns: cols, foreignKeys: fks, hasSequence: options.hasSequence ?? false };
}

export function schemaOf(...tables: TableDefinition[]): SchemaModel {
  return { tables: new Map(tables.map((t) => [t.name, t])) };
}

export const ACCOUNT = table('account', [
  { name: 'id', type: 'INTEGER', pk: true },
  { name: 'name', type: 'TEXT' },
]);

export const PROJECT = table(
  'project',
  [
    { name: 'id', type: 'INTEGER', pk: true },
    { name: 'name', type: 'TEXT' },
    { name: 'account_id', type: 'INTEGER' },
  ],
  [['account_id', 'account', 'id']],
);

// ── Filesystem fixtures ───────────────────────────────────────────

export function tempDir(prefix = 'reseed-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write an export tree. Keys are paths relative to `root`; object and
 * array values are written as JSON, strings verbatim.
 */
export function writeExport(root: string, files: Record<string, unknown>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, typeof content === 'string' ? content : JSON.stringify(content));
  }
}

/** Create a SQLite database file from DDL and close it */
export function createDatabase(file: string, ddl: string): string {
  const db = new Database(file);
  try {
    db.exec(ddl);
  } finally {
    db.close();
  }
  return file;
}
