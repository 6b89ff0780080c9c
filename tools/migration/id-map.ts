/**
 * Original ID -> Surrogate Key Mapping
 *
 * Every migrated row gets the next integer key of its table, starting at
 * 1, in the order rows are transformed. Foreign keys are rewritten by
 * looking the referenced row's original ID up here. References to
 * natural keys are checked against values recorded with rememberValue().
 * One IdMap lives for exactly one migration run and is passed explicitly
 * to whatever needs it; nothing is persisted.
 */

export class IdMap {
  /** table -> (original ID -> surrogate key); a table's counter is its map size */
  private byTable: Map<string, Map<string, number>> = new Map();
  /** table -> column -> values seen in migrated rows, for keys that are not re-assigned */
  private values: Map<string, Map<string, Set<string>>> = new Map();

  private keysFor(table: string): Map<string, number> {
    let keys = this.byTable.get(table);
    if (!keys) {
      keys = new Map();
      this.byTable.set(table, keys);
    }
    return keys;
  }

  /**
   * Get or assign the surrogate key for an original ID.
   * Only the first sighting advances the table's counter.
   */
  assign(table: string, originalId: string): number {
    const keys = this.keysFor(table);
    const existing = keys.get(originalId);
    if (existing !== undefined) return existing;

    const next = keys.size + 1;
    keys.set(originalId, next);
    return next;
  }

  /** Record a migrated row's value in a column other tables reference */
  rememberValue(table: string, column: string, value: string): void {
    let columns = this.values.get(table);
    if (!columns) {
      columns = new Map();
      this.values.set(table, columns);
    }
    let seen = columns.get(column);
    if (!seen) {
      seen = new Set();
      columns.set(column, seen);
    }
    seen.add(value);
  }

  /** Whether a migrated row of `table` carries `value` in `column` */
  hasValue(table: string, column: string, value: string): boolean {
    return this.values.get(table)?.get(column)?.has(value) ?? false;
  }

  /** Resolve an existing mapping (returns null if not found) */
  lookup(table: string, originalId: string): number | null {
    return this.byTable.get(table)?.get(originalId) ?? null;
  }

  has(table: string, originalId: string): boolean {
    return this.byTable.get(table)?.has(originalId) ?? false;
  }

  /** Key the next assign() for `table` would hand out */
  peekNext(table: string): number {
    return this.count(table) + 1;
  }

  /** Number of keys assigned in `table` so far */
  count(table: string): number {
    return this.byTable.get(table)?.size ?? 0;
  }

  /** Get statistics */
  stats(): { totalMappings: number; byTable: Record<string, number> } {
    const byTable: Record<string, number> = {};
    let total = 0;
    for (const table of [...this.byTable.keys()].sort()) {
      const n = this.count(table);
      byTable[table] = n;
      total += n;
    }
    return { totalMappings: total, byTable };
  }
}
