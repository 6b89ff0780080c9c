/**
 * Migration Pipeline Type Definitions
 */

// ── Destination schema ───────────────────────────────────────────

/** SQLite type affinity of a declared column type */
export type ColumnType = 'integer' | 'real' | 'numeric' | 'text' | 'blob';

export interface Column {
  readonly name: string;
  /** Declared type as written in CREATE TABLE (may be empty) */
  readonly declaredType: string;
  readonly type: ColumnType;
  /** 0-based declaration order */
  readonly position: number;
  readonly notNull: boolean;
  /** Default expression text, null when the column has none */
  readonly defaultValue: string | null;
  readonly primaryKey: boolean;
  /** Single INTEGER primary key of a rowid table: keys are assigned sequentially */
  readonly autoincrement: boolean;
}

export interface ForeignKey {
  /** Column on the referencing table */
  readonly column: string;
  readonly referencedTable: string;
  /** Null when the constraint names the referenced table's primary key implicitly */
  readonly referencedColumn: string | null;
}

export interface TableDefinition {
  readonly name: string;
  readonly columns: readonly Column[];
  readonly foreignKeys: readonly ForeignKey[];
  /** CREATE TABLE uses AUTOINCREMENT, so sqlite_sequence tracks it */
  readonly hasSequence: boolean;
}

export interface SchemaModel {
  readonly tables: ReadonlyMap<string, TableDefinition>;
}

// ── Source export ────────────────────────────────────────────────

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** One parsed source record */
export type SourceDocument = { [field: string]: JsonValue };

export interface DocumentRef {
  /** File the document was read from */
  filePath: string;
  /** Index within the file when it holds an array, else 0 */
  index: number;
  document: SourceDocument;
}

export interface InvalidFile {
  filePath: string;
  reason: string;
}

export interface RecordGroup {
  table: string;
  /** Source directories (or root files) feeding this table, in read order */
  sources: string[];
  documents: DocumentRef[];
  invalidFiles: InvalidFile[];
}

export interface CatalogWarning {
  code: string;
  message: string;
  directory?: string;
  table?: string;
  filePath?: string;
}

export interface SourceCatalog {
  groups: Map<string, RecordGroup>;
  warnings: CatalogWarning[];
}

// ── Ordering ─────────────────────────────────────────────────────

export interface DependencyEdge {
  from: string;
  to: string;
}

export interface ProcessingPlan {
  order: string[];
  /** Tables with at least one foreign key to themselves */
  selfReferencing: Set<string>;
}

// ── Rows & emission ──────────────────────────────────────────────

export type Literal =
  | { kind: 'null' }
  | { kind: 'integer'; value: number }
  | { kind: 'real'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'blob'; bytes: Uint8Array };

export interface RowCell {
  column: string;
  literal: Literal;
}

export type Row = RowCell[];

export type SkipReason =
  | 'InvalidDocumentFormat'
  | 'MissingParent'
  | 'MissingIdentifier'
  | 'DuplicateIdentifier';

export interface Skip {
  reason: SkipReason;
  table: string;
  originalId?: string;
  referencedTable?: string;
  column?: string;
  detail?: string;
}

export interface CoercionFallback {
  table: string;
  column: string;
  originalId?: string;
  reason: string;
}

// ── Reporting ────────────────────────────────────────────────────

export interface TableReport {
  discovered: number;
  emitted: number;
  skipped: number;
  skippedByReason: Partial<Record<SkipReason, number>>;
  /** Values emitted as text because they did not fit the column type */
  fallbacks: number;
}

export interface MigrationSummary {
  runId: string;
  startedAt: Date;
  completedAt?: Date;
  status: 'running' | 'completed' | 'failed';
  dryRun: boolean;
  outputFile: string | null;
  order: string[];
  tables: Record<string, TableReport>;
  warnings: CatalogWarning[];
}
