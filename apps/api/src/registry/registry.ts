import { duplicateVersion, noMigrationPath, schemaInvalid, unknownVersion } from '../errors';
import { createModuleLogger } from '../logger';
import type { SchemaDefinition, SchemaDiff, SchemaVersion, TableDef } from '../types/schema';
import { compareVersions, parseVersion, sortVersions } from '../utils/version';
import { computeDiff } from './diff';
import { validateDefinition } from './validate';

const log = createModuleLogger('registry');

export type RegisterOptions = {
  /**
   * Version this one evolved from. Defaults to the greatest registered version, which
   * then has to sort below this one: a version inserted under newer ones names its parent.
   */
  parent?: string;
};

const freezeTable = (table: TableDef): TableDef =>
  Object.freeze({
    name: table.name,
    fields: Object.freeze(table.fields.map(f => Object.freeze({ ...f }))),
    primaryKey: Object.freeze([...table.primaryKey]),
    foreignKeys: Object.freeze(
      table.foreignKeys.map(fk => Object.freeze({ field: fk.field, references: Object.freeze({ ...fk.references }) }))
    )
  });

/**
 * Append-only store of schema versions. Versions are immutable once registered and
 * are linked to a parent, which gives the upgrade/downgrade paths between them.
 */
export class SchemaRegistry {
  private readonly versions = new Map<string, SchemaVersion>();
  private readonly diffs = new Map<string, SchemaDiff>();

  register(version: string, definition: SchemaDefinition, options: RegisterOptions = {}): SchemaVersion {
    if (this.versions.has(version)) throw duplicateVersion(version);
    if (!parseVersion(version)) throw schemaInvalid(`"${version}" is not an orderable version id`, { version });
    const clash = [...this.versions.keys()].find(v => compareVersions(v, version) === 0);
    if (clash) throw duplicateVersion(version);

    validateDefinition(version, definition);

    if (options.parent === undefined) {
      const newer = sortVersions([...this.versions.keys()]).filter(v => compareVersions(v, version) > 0);
      if (newer.length) {
        throw schemaInvalid(`Version ${version} sorts below registered ${newer[0]}; register it with an explicit parent`, {
          version
        });
      }
    }
    const parent = options.parent ?? this.defaultParent(version);
    if (parent !== null) {
      if (!this.versions.has(parent)) throw unknownVersion(parent);
      if (compareVersions(parent, version) >= 0) {
        throw schemaInvalid(`Parent ${parent} must precede ${version}`, { version });
      }
    }

    const registered: SchemaVersion = Object.freeze({
      version,
      parent,
      description: definition.description,
      tables: Object.freeze(definition.tables.map(freezeTable))
    });
    this.versions.set(version, registered);
    log.info({ version, parent, tables: registered.tables.length }, 'schema version registered');
    return registered;
  }

  has(version: string) {
    return this.versions.has(version);
  }

  get(version: string): SchemaVersion {
    const schema = this.versions.get(version);
    if (!schema) throw unknownVersion(version);
    return schema;
  }

  list(): SchemaVersion[] {
    return sortVersions([...this.versions.keys()]).map(v => this.get(v));
  }

  diff(from: string, to: string): SchemaDiff {
    const key = `${from}\u0000${to}`;
    const cached = this.diffs.get(key);
    if (cached) return cached;
    const result = computeDiff(this.get(from), this.get(to));
    this.diffs.set(key, result);
    return result;
  }

  /** Ordered versions from `from` to `to`, both included; a downgrade walks the chain backwards. */
  path(from: string, to: string): string[] {
    this.get(from);
    this.get(to);
    const upward = this.lineage(to);
    const up = upward.indexOf(from);
    if (up >= 0) return upward.slice(0, up + 1).reverse();
    const downward = this.lineage(from);
    const down = downward.indexOf(to);
    if (down >= 0) return downward.slice(0, down + 1);
    throw noMigrationPath(from, to);
  }

  private lineage(version: string): string[] {
    const chain: string[] = [];
    let current: string | null = version;
    while (current !== null) {
      chain.push(current);
      current = this.get(current).parent;
    }
    return chain;
  }

  private defaultParent(version: string): string | null {
    const lower = sortVersions([...this.versions.keys()]).filter(v => compareVersions(v, version) < 0);
    return lower.length ? lower[lower.length - 1] : null;
  }
}
