import { FerryError, schemaInvalid } from '../errors';
import { createModuleLogger } from '../logger';
import type { SchemaRegistry } from '../registry/registry';
import { findField, findTable } from '../types/schema';
import type { SchemaVersion } from '../types/schema';
import { SingleFlightCache } from './cache';
import { composeRuleSets } from './compose';
import { DEFAULT_FUZZY_THRESHOLD, inferRuleSet } from './infer';
import { overallCoverage, tableCoverage } from './rules';
import type { FieldOverride, MappingRule, Overrides, RowTransform, RuleSet, TableRuleSet } from './rules';

const log = createModuleLogger('mapper');

export type ResolvedRules = {
  ruleSet: RuleSet;
  /** ManualOverride expression id → transform capability. */
  transforms: Map<string, RowTransform>;
};

const overrideRule = (override: FieldOverride): MappingRule =>
  'drop' in override ? { kind: 'Drop' } : { kind: 'ManualOverride', expressionId: override.id };

const applyFieldOverrides = (table: TableRuleSet, overrides: FieldOverride[]): TableRuleSet => {
  if (!overrides.length) return table;
  const byField = new Map(overrides.map(o => [o.field, o]));
  const rules = table.rules.map(r => {
    const override = byField.get(r.field);
    return override ? { field: r.field, rule: overrideRule(override) } : r;
  });
  const unresolved = table.unresolved.filter(u => !byField.has(u.field));
  for (const gap of table.unresolved) {
    const override = byField.get(gap.field);
    if (override) rules.push({ field: gap.field, rule: overrideRule(override) });
  }
  return { ...table, rules, unresolved, coverage: tableCoverage(rules.length, unresolved.length) };
};

/**
 * Produces transformation rule sets between registered versions. Pairwise and
 * composed rule sets are cached per version pair for the lifetime of the mapper,
 * which shares the registry's lifetime; registered versions never change.
 */
export class FieldMapper {
  private readonly cache = new SingleFlightCache<RuleSet>();
  private readonly threshold: number;

  constructor(
    private readonly registry: SchemaRegistry,
    options: { threshold?: number } = {}
  ) {
    this.threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  }

  /** Inferred (override-free) rules from one version to another, composed along the registry path. */
  ruleSet(from: string, to: string): Promise<RuleSet> {
    return this.cache.getOrCompute(`${from}->${to}`, async () => {
      const path = this.registry.path(from, to);
      if (path.length <= 2) {
        const result = inferRuleSet(this.registry.get(from), this.registry.get(to), { threshold: this.threshold });
        log.debug({ from, to, coverage: result.coverage }, 'rule set inferred');
        return result;
      }
      let composed = await this.ruleSet(path[0], path[1]);
      for (let i = 1; i < path.length - 1; i++) {
        const step = await this.ruleSet(path[i], path[i + 1]);
        composed = composeRuleSets(composed, step, this.registry.get(from), this.registry.get(path[i + 1]));
      }
      log.debug({ from, to, path, coverage: composed.coverage }, 'rule set composed');
      return composed;
    });
  }

  /**
   * Final rules for one restore: inferred rules with the caller's table and field
   * overrides applied. Fails with AmbiguousMatch while an ambiguous field is left.
   */
  async resolve(from: string, to: string, overrides: Overrides = {}): Promise<ResolvedRules> {
    const source = this.registry.get(from);
    const target = this.registry.get(to);
    let ruleSet = await this.ruleSet(from, to);

    const tableSources = overrides.tables ?? {};
    if (Object.keys(tableSources).length) {
      this.checkTableOverrides(source, target, tableSources);
      const direct = inferRuleSet(source, target, { threshold: this.threshold, tableSources });
      const tables = ruleSet.tables.map(t => (t.table in tableSources ? direct.tables.find(d => d.table === t.table) ?? t : t));
      const used = new Set(tables.map(t => t.sourceTable));
      ruleSet = {
        ...ruleSet,
        tables,
        droppedTables: source.tables.map(t => t.name).filter(n => !used.has(n)),
        coverage: overallCoverage(tables)
      };
    }

    const fieldOverrides = overrides.fields ?? [];
    const transforms = new Map<string, RowTransform>();
    for (const override of fieldOverrides) {
      const table = findTable(target, override.table);
      if (!table || !findField(table, override.field)) {
        throw schemaInvalid(`Override targets unknown field ${override.table}.${override.field}`, {
          table: override.table,
          field: override.field,
          version: to
        });
      }
      if ('transform' in override) {
        if (transforms.has(override.id)) {
          throw schemaInvalid(`Override id ${override.id} is used twice`, { table: override.table, field: override.field });
        }
        transforms.set(override.id, override.transform);
      }
    }
    if (fieldOverrides.length) {
      const tables = ruleSet.tables.map(t => applyFieldOverrides(t, fieldOverrides.filter(o => o.table === t.table)));
      ruleSet = { ...ruleSet, tables, coverage: overallCoverage(tables) };
    }

    for (const table of ruleSet.tables) {
      const ambiguous = table.unresolved.find(u => u.reason === 'ambiguous');
      if (ambiguous) {
        throw new FerryError(
          'AmbiguousMatch',
          `${table.table}.${ambiguous.field} matches ${ambiguous.candidates.map(c => c.field).join(' and ')} equally`,
          { table: table.table, field: ambiguous.field, candidates: ambiguous.candidates, version: to }
        );
      }
    }

    return { ruleSet, transforms };
  }

  private checkTableOverrides(source: SchemaVersion, target: SchemaVersion, tableSources: Record<string, string>) {
    for (const [targetTable, sourceTable] of Object.entries(tableSources)) {
      if (!findTable(target, targetTable)) {
        throw schemaInvalid(`Table override targets unknown table ${targetTable}`, { table: targetTable, version: target.version });
      }
      if (!findTable(source, sourceTable)) {
        throw schemaInvalid(`Table override reads unknown table ${sourceTable}`, { table: sourceTable, version: source.version });
      }
    }
  }
}
