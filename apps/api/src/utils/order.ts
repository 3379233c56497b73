import type { TableDef } from '../types/schema';

/**
 * Tables ordered parents-first along their foreign keys, declaration order among peers.
 * Self references are ignored; tables caught in a cycle keep declaration order.
 */
export const parentsFirst = <T extends TableDef>(tables: readonly T[]): T[] => {
  const names = new Set(tables.map(t => t.name));
  const placed = new Set<string>();
  const ordered: T[] = [];
  const pending = [...tables];

  while (pending.length) {
    const index = pending.findIndex(t =>
      t.foreignKeys.every(fk => fk.references.table === t.name || !names.has(fk.references.table) || placed.has(fk.references.table))
    );
    const next = pending.splice(index >= 0 ? index : 0, 1)[0];
    placed.add(next.name);
    ordered.push(next);
  }
  return ordered;
};
