/**
 * SQL Statement Emitter
 *
 * Renders rows as SQLite INSERT statements and assembles the output
 * artifact:
 *
 *   PRAGMA foreign_keys = OFF;
 *   -- Clear existing data from tables before migration
 *   DELETE FROM "account";
 *   DELETE FROM sqlite_sequence WHERE name = 'account';
 *
 *   -- SQL statements for table: account
 *   INSERT INTO "account" ("id", "name") VALUES (1, 'Acme');
 *
 *   PRAGMA foreign_keys = ON;
 *
 * Identifiers are always double-quoted and every text value goes through
 * quoteText(), so document content can never change statement structure.
 */
import type { Literal, Row, SchemaModel } from './types';

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function hex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}

/**
 * Quote a text value as a SQL string literal.
 * NUL cannot appear inside a quoted literal, so such text is cast from
 * its UTF-8 bytes instead.
 */
export function quoteText(value: string): string {
  if (value.includes('\u0000')) {
    return `CAST(X'${hex(new TextEncoder().encode(value))}' AS TEXT)`;
  }
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderReal(value: number): string {
  const str = String(value);
  return Number.isInteger(value) && /^-?\d+$/.test(str) ? `${str}.0` : str;
}

export function renderLiteral(literal: Literal): string {
  switch (literal.kind) {
    case 'null':
      return 'NULL';
    case 'integer':
      return String(literal.value);
    case 'real':
      return renderReal(literal.value);
    case 'text':
      return quoteText(literal.value);
    case 'blob':
      return `X'${hex(literal.bytes)}'`;
  }
}

export function insertStatement(table: string, row: Row): string {
  const columns = row.map((cell) => quoteIdentifier(cell.column)).join(', ');
  const values = row.map((cell) => renderLiteral(cell.literal)).join(', ');
  return `INSERT INTO ${quoteIdentifier(table)} (${columns}) VALUES (${values});`;
}

export function clearStatement(table: string): string {
  return `DELETE FROM ${quoteIdentifier(table)};`;
}

export const FOREIGN_KEYS_OFF = 'PRAGMA foreign_keys = OFF;';
export const FOREIGN_KEYS_ON = 'PRAGMA foreign_keys = ON;';

export function sequenceResetStatement(table: string): string {
  return `DELETE FROM sqlite_sequence WHERE name = ${quoteText(table)};`;
}

/** Keep comment text on one line */
function commentText(text: string): string {
  return text.replace(/[\r\n]+/g, ' ');
}

interface TableSection {
  table: string;
  /** Extra detail for the section marker, e.g. a sort criterion */
  note?: string;
  inserts: string[];
}

/**
 * Collects per-table insert statements in processing order and renders
 * the full artifact. Rows are rendered to text as they are added.
 */
export class StatementEmitter {
  private sections: TableSection[] = [];
  private byTable = new Map<string, TableSection>();

  constructor(private schema: SchemaModel) {}

  beginTable(table: string, note?: string): void {
    if (this.byTable.has(table)) return;
    const section: TableSection = { table, note, inserts: [] };
    this.sections.push(section);
    this.byTable.set(table, section);
  }

  addRow(table: string, row: Row): void {
    if (!this.byTable.has(table)) this.beginTable(table);
    this.byTable.get(table)?.inserts.push(insertStatement(table, row));
  }

  rowCount(table: string): number {
    return this.byTable.get(table)?.inserts.length ?? 0;
  }

  /** Tables that receive at least one row, in processing order */
  populatedTables(): string[] {
    return this.sections.filter((s) => s.inserts.length > 0).map((s) => s.table);
  }

  /**
   * Output lines: clearing preamble first, then one section per table.
   * Foreign-key enforcement is off while the script runs, since tables
   * are cleared parents first.
   */
  *lines(): Generator<string> {
    const populated = this.populatedTables();
    if (populated.length > 0) {
      yield FOREIGN_KEYS_OFF;
      yield '-- Clear existing data from tables before migration';
      for (const table of populated) {
        yield clearStatement(table);
        if (this.schema.tables.get(table)?.hasSequence) {
          yield sequenceResetStatement(table);
        }
      }
      yield '';
    }

    for (const section of this.sections) {
      const label = section.note ? `${section.table} (${section.note})` : section.table;
      yield `-- SQL statements for table: ${commentText(label)}`;
      yield* section.inserts;
      yield '';
    }

    if (populated.length > 0) {
      yield FOREIGN_KEYS_ON;
      yield '';
    }
  }

  render(): string {
    return [...this.lines()].join('\n');
  }
}
