import { FerryError, errorMessage, schemaInvalid } from '../errors';
import { findField, findTable, isRequired } from '../types/schema';
import type { SchemaVersion } from '../types/schema';
import { applyConversions, composeConversions } from './coerce';
import {
  confidenceOf,
  conversionsOf,
  hasSource,
  overallCoverage,
  sourceRule,
  tableCoverage
} from './rules';
import type { FieldRule, MappingRule, RuleSet, SourceRule, TableRuleSet, UnresolvedField } from './rules';

/**
 * Composes the rule producing an intermediate field (`first`) with the rule that
 * reads that field (`second`). Pure and total over the rule variants: it returns
 * one rule or throws UnsupportedCoercionChain.
 */
export const composeRules = (target: string, first: MappingRule, second: SourceRule): MappingRule => {
  switch (first.kind) {
    case 'Drop':
    case 'ManualOverride':
      return first;
    case 'DefaultFill': {
      if (second.kind !== 'TypeCoerce') return first;
      try {
        return { kind: 'DefaultFill', value: applyConversions(first.value, second.conversions) };
      } catch (err) {
        throw new FerryError(
          'UnsupportedCoercionChain',
          `Default ${JSON.stringify(first.value)} cannot pass through ${second.conversions.join(', ')}: ${errorMessage(err)}`,
          { field: target }
        );
      }
    }
    case 'DirectCopy':
    case 'Rename':
    case 'TypeCoerce': {
      const conversions = composeConversions(conversionsOf(first), conversionsOf(second));
      const reason = second.kind === 'DirectCopy' ? (first.kind === 'DirectCopy' ? 'exact' : first.reason) : second.reason;
      return sourceRule(target, first.source, conversions, confidenceOf(first) * confidenceOf(second), reason);
    }
  }
};

const composeTable = (
  first: RuleSet,
  second: TableRuleSet,
  targetSchema: SchemaVersion
): TableRuleSet => {
  if (second.sourceTable === null) return second;
  const upstream = first.tables.find(t => t.table === second.sourceTable);
  if (!upstream) {
    throw schemaInvalid(`Rule set ${first.sourceVersion}->${first.targetVersion} has no table ${second.sourceTable}`, {
      table: second.sourceTable
    });
  }
  const targetTable = findTable(targetSchema, second.table);

  const rules: FieldRule[] = [];
  const unresolved: UnresolvedField[] = [...second.unresolved];

  for (const { field, rule } of second.rules) {
    if (!hasSource(rule)) {
      rules.push({ field, rule });
      continue;
    }
    const produced = upstream.rules.find(r => r.field === rule.source);
    if (produced) {
      try {
        rules.push({ field, rule: composeRules(field, produced.rule, rule) });
      } catch (err) {
        if (err instanceof FerryError && !err.details.table) {
          throw new FerryError(err.kind, err.message, { ...err.details, table: second.table, field });
        }
        throw err;
      }
      continue;
    }
    const gap = upstream.unresolved.find(u => u.field === rule.source);
    const def = targetTable ? findField(targetTable, field) : null;
    unresolved.push({
      field,
      reason: gap?.reason ?? 'unmatched',
      required: def ? isRequired(def) : true,
      candidates: gap?.candidates ?? []
    });
  }

  const order = new Map((targetTable?.fields ?? []).map((f, i) => [f.name, i]));
  const position = (name: string) => order.get(name) ?? Number.MAX_SAFE_INTEGER;
  rules.sort((a, b) => position(a.field) - position(b.field));
  unresolved.sort((a, b) => position(a.field) - position(b.field));

  const read = new Set(rules.map(r => r.rule).filter(hasSource).map(r => r.source));
  const sourceFields = upstream.rules
    .map(r => r.rule)
    .filter(hasSource)
    .map(r => r.source);

  return {
    table: second.table,
    sourceTable: upstream.sourceTable,
    rules,
    unresolved,
    droppedSourceFields: [
      ...upstream.droppedSourceFields,
      ...sourceFields.filter(f => !read.has(f))
    ],
    coverage: tableCoverage(rules.length, unresolved.length)
  };
};

/** Composes A→B with B→C into A→C, field by field along each target field's lineage. */
export const composeRuleSets = (
  first: RuleSet,
  second: RuleSet,
  sourceSchema: SchemaVersion,
  targetSchema: SchemaVersion
): RuleSet => {
  if (first.targetVersion !== second.sourceVersion) {
    throw schemaInvalid(`Cannot compose ${first.sourceVersion}->${first.targetVersion} with ${second.sourceVersion}->${second.targetVersion}`);
  }
  const tables = second.tables.map(t => composeTable(first, t, targetSchema));
  const used = new Set(tables.map(t => t.sourceTable));

  return {
    sourceVersion: first.sourceVersion,
    targetVersion: second.targetVersion,
    path: [...first.path, ...second.path.slice(1)],
    tables,
    droppedTables: sourceSchema.tables.map(t => t.name).filter(n => !used.has(n)),
    coverage: overallCoverage(tables)
  };
};
