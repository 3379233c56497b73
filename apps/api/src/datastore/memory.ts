import { FerryError, constraintViolation } from '../errors';
import type { Row, SchemaVersion, TableDef } from '../types/schema';
import { canonicalJson, keyValues, rowKey, sortByKey } from '../utils/values';
import type { DataStore, SinkTransaction } from './types';
import { requireTable } from './values';

type Tables = Map<string, Map<string, Row>>;

const cloneTables = (tables: Tables): Tables =>
  new Map([...tables].map(([name, rows]) => [name, new Map(rows)]));

const violation = (table: string, message: string) => constraintViolation(table, new Error(message));

/**
 * In-process store enforcing primary keys, nullability and foreign keys (checked at
 * commit, like deferred constraints). Transactions work on a private copy.
 */
export class MemoryDataStore implements DataStore {
  private tables: Tables = new Map();

  constructor(
    private readonly schema: SchemaVersion,
    seed: Record<string, Row[]> = {}
  ) {
    this.reset();
    for (const [table, rows] of Object.entries(seed)) {
      const def = requireTable(schema, table);
      const target = this.tables.get(table);
      for (const row of rows) target?.set(rowKey(row, def.primaryKey), { ...row });
    }
  }

  reset() {
    this.tables = new Map(this.schema.tables.map(t => [t.name, new Map<string, Row>()]));
  }

  async *readTable(table: string): AsyncIterable<Row> {
    requireTable(this.schema, table);
    for (const row of this.tables.get(table)?.values() ?? []) yield { ...row };
  }

  /** Every table's rows ordered by primary key. */
  snapshot(): Record<string, Row[]> {
    return Object.fromEntries(
      this.schema.tables.map(t => [t.name, sortByKey([...(this.tables.get(t.name)?.values() ?? [])], t.primaryKey)])
    );
  }

  async beginTransaction(): Promise<SinkTransaction> {
    const staged = cloneTables(this.tables);
    let open = true;
    const ensureOpen = () => {
      if (!open) throw new FerryError('SchemaInvalid', 'Transaction already finished');
    };

    return {
      writeRows: async (table, rows) => {
        ensureOpen();
        const def = requireTable(this.schema, table);
        const target = staged.get(table);
        for (const row of rows) {
          this.checkRow(def, row);
          target?.set(rowKey(row, def.primaryKey), { ...row });
        }
      },
      deleteRows: async (table, keys) => {
        ensureOpen();
        const def = requireTable(this.schema, table);
        for (const key of keys) staged.get(table)?.delete(rowKey(key, def.primaryKey));
      },
      commit: async () => {
        ensureOpen();
        this.checkForeignKeys(staged);
        open = false;
        this.tables = staged;
      },
      abort: async () => {
        open = false;
      }
    };
  }

  private checkRow(def: TableDef, row: Row) {
    for (const field of def.fields) {
      const value = row[field.name];
      if ((value === null || value === undefined) && !field.nullable) {
        throw violation(def.name, `${def.name}.${field.name} may not be null`);
      }
    }
  }

  private checkForeignKeys(tables: Tables) {
    for (const def of this.schema.tables) {
      for (const fk of def.foreignKeys) {
        const parent = requireTable(this.schema, fk.references.table);
        const parentValues = new Set(
          [...(tables.get(parent.name)?.values() ?? [])].map(r => canonicalJson(r[fk.references.field] ?? null))
        );
        for (const row of tables.get(def.name)?.values() ?? []) {
          const value = row[fk.field] ?? null;
          if (value !== null && !parentValues.has(canonicalJson(value))) {
            throw violation(
              def.name,
              `${def.name}.${fk.field}=${canonicalJson(value)} has no parent in ${parent.name} (key ${canonicalJson(keyValues(row, def.primaryKey))})`
            );
          }
        }
      }
    }
  }
}
