/**
 * Dependency Resolver
 *
 * Orders tables so every table comes after the tables it references.
 * Only tables present in the source take part; references to anything
 * else are already satisfied by the destination. Self-references are set
 * aside (rows of such tables are ordered by the transformer instead).
 * Ties are broken by table name so the order is reproducible.
 */
import { CyclicDependencyError } from './errors';
import type { DependencyEdge, ProcessingPlan, SchemaModel } from './types';

export interface DependencyGraph {
  edges: DependencyEdge[];
  selfReferencing: Set<string>;
}

/** Foreign-key edges among `tables` (edge from referencing to referenced table) */
export function buildDependencyGraph(schema: SchemaModel, tables: Iterable<string>): DependencyGraph {
  const present = new Set(tables);
  const seen = new Set<string>();
  const edges: DependencyEdge[] = [];
  const selfReferencing = new Set<string>();

  for (const name of present) {
    const def = schema.tables.get(name);
    if (!def) continue;
    for (const fk of def.foreignKeys) {
      if (!present.has(fk.referencedTable)) continue;
      if (fk.referencedTable === name) {
        selfReferencing.add(name);
        continue;
      }
      const key = `${name}\u0000${fk.referencedTable}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push({ from: name, to: fk.referencedTable });
    }
  }

  return { edges, selfReferencing };
}

function insertSorted(list: string[], value: string): void {
  let i = 0;
  while (i < list.length && (list[i] ?? '') < value) i++;
  list.splice(i, 0, value);
}

/**
 * Topologically sort `tables` over `edges`.
 * Throws CyclicDependencyError naming every table on a multi-table cycle.
 */
export function resolveOrder(tables: Iterable<string>, edges: readonly DependencyEdge[]): string[] {
  const nodes = [...new Set(tables)].sort();
  const nodeSet = new Set(nodes);
  const pending = new Map<string, number>(nodes.map((n) => [n, 0]));
  const dependents = new Map<string, string[]>(nodes.map((n) => [n, []]));

  for (const { from, to } of edges) {
    if (from === to || !nodeSet.has(from) || !nodeSet.has(to)) continue;
    pending.set(from, (pending.get(from) ?? 0) + 1);
    dependents.get(to)?.push(from);
  }

  const ready = nodes.filter((n) => pending.get(n) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const left = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, left);
      if (left === 0) insertSorted(ready, dependent);
    }
  }

  if (order.length < nodes.length) {
    const placed = new Set(order);
    const remaining = nodes.filter((n) => !placed.has(n));
    throw new CyclicDependencyError(findCycleMembers(remaining, edges));
  }

  return order;
}

/** Tables on a cycle: members of strongly connected components larger than one */
export function findCycleMembers(tables: readonly string[], edges: readonly DependencyEdge[]): string[] {
  const nodeSet = new Set(tables);
  const adjacency = new Map<string, string[]>(tables.map((t) => [t, []]));
  for (const { from, to } of edges) {
    if (from !== to && nodeSet.has(from) && nodeSet.has(to)) adjacency.get(from)?.push(to);
  }

  // Tarjan's algorithm
  let counter = 0;
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const members: string[] = [];

  const visit = (node: string): void => {
    index.set(node, counter);
    low.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const next of adjacency.get(node) ?? []) {
      if (!index.has(next)) {
        visit(next);
        low.set(node, Math.min(low.get(node) ?? 0, low.get(next) ?? 0));
      } else if (onStack.has(next)) {
        low.set(node, Math.min(low.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (low.get(node) === index.get(node)) {
      const component: string[] = [];
      let popped: string | undefined;
      do {
        popped = stack.pop();
        if (popped === undefined) break;
        onStack.delete(popped);
        component.push(popped);
      } while (popped !== node);
      if (component.length > 1) members.push(...component);
    }
  };

  for (const table of tables) {
    if (!index.has(table)) visit(table);
  }

  return members.sort();
}

/** Full plan for the tables a run will populate */
export function planProcessing(schema: SchemaModel, tables: Iterable<string>): ProcessingPlan {
  const present = [...tables];
  const graph = buildDependencyGraph(schema, present);
  return {
    order: resolveOrder(present, graph.edges),
    selfReferencing: graph.selfReferencing,
  };
}
