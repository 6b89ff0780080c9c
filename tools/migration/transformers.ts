/**
 * Record Transformer
 *
 * Turns one source document into a typed row for its destination table:
 *   - the autoincrement key is replaced by a fresh surrogate key (IdMap)
 *   - foreign keys to re-keyed tables are rewritten to the parent's new key
 *   - other foreign keys into migrated tables must name a migrated parent
 *   - every other column is coerced to its declared type
 *
 * Nothing is assigned until the whole record has been checked, so a
 * skipped record never consumes a surrogate key.
 */
import { IdMap } from './id-map';
import { coerceValue, fieldOf, identifierOf, NULL_LITERAL } from './cleaner';
import { referencedColumnName, surrogateKeyColumn } from './schema';
import type {
  CoercionFallback,
  ForeignKey,
  Literal,
  Row,
  SchemaModel,
  Skip,
  SourceDocument,
  TableDefinition,
} from './types';

export interface TransformContext {
  schema: SchemaModel;
  idMap: IdMap;
  /** Tables whose keys are reassigned in this run */
  rekeyed: ReadonlySet<string>;
  /** Every table populated in this run */
  migrated: ReadonlySet<string>;
  /** table -> columns whose values are recorded so references to them can be checked */
  verified: ReadonlyMap<string, ReadonlySet<string>>;
}

export type TransformOutcome =
  | { kind: 'row'; row: Row; originalId?: string; fallbacks: CoercionFallback[] }
  | { kind: 'skip'; skip: Skip }
  /** Self-reference to a row of the same table that has no key yet */
  | { kind: 'defer'; originalId?: string; column: string; parentId: string };

export interface TransformOptions {
  /** Return `defer` instead of skipping an unresolved self-reference */
  allowDefer?: boolean;
}

/** Foreign keys that must be rewritten through the IdMap, by column */
export function rekeyedForeignKeys(
  table: TableDefinition,
  ctx: Pick<TransformContext, 'schema' | 'rekeyed'>,
): Map<string, ForeignKey> {
  const result = new Map<string, ForeignKey>();
  for (const fk of table.foreignKeys) {
    if (result.has(fk.column) || !ctx.rekeyed.has(fk.referencedTable)) continue;
    const target = ctx.schema.tables.get(fk.referencedTable);
    const key = target ? surrogateKeyColumn(target) : null;
    if (key && referencedColumnName(ctx.schema, fk) === key.name) {
      result.set(fk.column, fk);
    }
  }
  return result;
}

export interface VerifiedForeignKey {
  fk: ForeignKey;
  referencedColumn: string;
}

/**
 * Foreign keys into tables of this run that keep their value: the
 * referenced table has no surrogate key, or the key points at another
 * column. The parent row must still have been migrated.
 */
export function verifiedForeignKeys(
  table: TableDefinition,
  ctx: Pick<TransformContext, 'schema' | 'rekeyed' | 'migrated'>,
): VerifiedForeignKey[] {
  const rewritten = rekeyedForeignKeys(table, ctx);
  const result: VerifiedForeignKey[] = [];
  for (const fk of table.foreignKeys) {
    if (rewritten.has(fk.column) || !ctx.migrated.has(fk.referencedTable)) continue;
    const referencedColumn = referencedColumnName(ctx.schema, fk);
    if (referencedColumn) result.push({ fk, referencedColumn });
  }
  return result;
}

/** Context for one run over `tables` */
export function createTransformContext(
  schema: SchemaModel,
  tables: Iterable<string>,
  idMap: IdMap = new IdMap(),
): TransformContext {
  const migrated = new Set(tables);
  const rekeyed = new Set(
    [...migrated].filter((name) => {
      const def = schema.tables.get(name);
      return def ? surrogateKeyColumn(def) !== null : false;
    }),
  );

  const verified = new Map<string, Set<string>>();
  for (const name of migrated) {
    const def = schema.tables.get(name);
    if (!def) continue;
    for (const { fk, referencedColumn } of verifiedForeignKeys(def, { schema, rekeyed, migrated })) {
      let columns = verified.get(fk.referencedTable);
      if (!columns) {
        columns = new Set();
        verified.set(fk.referencedTable, columns);
      }
      columns.add(referencedColumn);
    }
  }

  return { schema, idMap, rekeyed, migrated, verified };
}

type Unresolved =
  | { kind: 'missing'; parentId: string | null }
  | { kind: 'pending'; parentId: string };

type Resolved = { kind: 'ok'; literal: Literal } | Unresolved;

function resolveReference(
  table: TableDefinition,
  fk: ForeignKey,
  document: SourceDocument,
  originalId: string | undefined,
  idMap: IdMap,
): Resolved {
  const value = fieldOf(document, fk.column);
  if (value === undefined || value === null) return { kind: 'ok', literal: NULL_LITERAL };

  const parentId = identifierOf(value);
  if (parentId === null) return { kind: 'missing', parentId: null };

  const isSelf = fk.referencedTable === table.name;
  if (isSelf && parentId === originalId) {
    return { kind: 'ok', literal: { kind: 'integer', value: idMap.peekNext(table.name) } };
  }

  const key = idMap.lookup(fk.referencedTable, parentId);
  if (key !== null) return { kind: 'ok', literal: { kind: 'integer', value: key } };
  return isSelf ? { kind: 'pending', parentId } : { kind: 'missing', parentId };
}

/** Check a kept reference against the recorded parent values; null when satisfied */
function verifyReference(
  table: TableDefinition,
  { fk, referencedColumn }: VerifiedForeignKey,
  document: SourceDocument,
  idMap: IdMap,
): Unresolved | null {
  const value = fieldOf(document, fk.column);
  if (value === undefined || value === null) return null;

  const parentId = identifierOf(value);
  if (parentId === null) return { kind: 'missing', parentId: null };

  const isSelf = fk.referencedTable === table.name;
  if (isSelf && parentId === identifierOf(fieldOf(document, referencedColumn))) return null;
  if (idMap.hasValue(fk.referencedTable, referencedColumn, parentId)) return null;
  return isSelf ? { kind: 'pending', parentId } : { kind: 'missing', parentId };
}

export function transformRecord(
  table: TableDefinition,
  document: SourceDocument,
  ctx: TransformContext,
  options: TransformOptions = {},
): TransformOutcome {
  const keyColumn = surrogateKeyColumn(table);
  let originalId: string | undefined;

  if (keyColumn) {
    const id = identifierOf(fieldOf(document, keyColumn.name));
    if (id === null) {
      return {
        kind: 'skip',
        skip: { reason: 'MissingIdentifier', table: table.name, column: keyColumn.name },
      };
    }
    if (ctx.idMap.has(table.name, id)) {
      return { kind: 'skip', skip: { reason: 'DuplicateIdentifier', table: table.name, originalId: id } };
    }
    originalId = id;
  } else {
    const pk = table.columns.find((c) => c.primaryKey);
    originalId = pk ? identifierOf(fieldOf(document, pk.name)) ?? undefined : undefined;
  }

  // Parents in other tables first: a missing one skips the record even
  // when a self-reference would only defer it.
  const checks: Array<{ fk: ForeignKey; referencedColumn: string | null }> = [
    ...[...rekeyedForeignKeys(table, ctx).values()].map((fk) => ({ fk, referencedColumn: null })),
    ...verifiedForeignKeys(table, ctx),
  ].sort(
    (a, b) => Number(a.fk.referencedTable === table.name) - Number(b.fk.referencedTable === table.name),
  );
  const references = new Map<string, Literal>();

  for (const { fk, referencedColumn } of checks) {
    let resolved: Unresolved | null;
    if (referencedColumn === null) {
      const rewritten = resolveReference(table, fk, document, originalId, ctx.idMap);
      if (rewritten.kind === 'ok') {
        references.set(fk.column, rewritten.literal);
        continue;
      }
      resolved = rewritten;
    } else {
      resolved = verifyReference(table, { fk, referencedColumn }, document, ctx.idMap);
      if (resolved === null) continue;
    }

    if (resolved.kind === 'pending' && options.allowDefer) {
      return { kind: 'defer', originalId, column: fk.column, parentId: resolved.parentId };
    }
    return {
      kind: 'skip',
      skip: {
        reason: 'MissingParent',
        table: table.name,
        originalId,
        referencedTable: fk.referencedTable,
        column: fk.column,
        detail: resolved.parentId === null ? 'reference is not an identifier' : `parent ${resolved.parentId} not found`,
      },
    };
  }

  const row: Row = [];
  const fallbacks: CoercionFallback[] = [];

  for (const column of table.columns) {
    if (keyColumn && column.name === keyColumn.name) {
      row.push({ column: column.name, literal: NULL_LITERAL });
      continue;
    }

    const reference = references.get(column.name);
    if (reference) {
      row.push({ column: column.name, literal: reference });
      continue;
    }

    if (!Object.hasOwn(document, column.name) && column.defaultValue !== null) continue;

    const coerced = coerceValue(fieldOf(document, column.name), column);
    if (coerced.kind === 'fallback') {
      fallbacks.push({ table: table.name, column: column.name, originalId, reason: coerced.reason });
    }
    row.push({ column: column.name, literal: coerced.literal });
  }

  if (keyColumn && originalId !== undefined) {
    const key = ctx.idMap.assign(table.name, originalId);
    const cell = row.find((c) => c.column === keyColumn.name);
    if (cell) cell.literal = { kind: 'integer', value: key };
  }

  for (const column of ctx.verified.get(table.name) ?? []) {
    const value = identifierOf(fieldOf(document, column));
    if (value !== null) ctx.idMap.rememberValue(table.name, column, value);
  }

  return { kind: 'row', row, originalId, fallbacks };
}
