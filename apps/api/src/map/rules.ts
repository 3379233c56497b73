import type { MatchCandidate } from '../errors';
import type { FieldValue, Row } from '../types/schema';
import type { ConversionId } from './coerce';

export type MatchReason = 'exact' | 'semantic_tag' | 'type_change' | 'fuzzy_name' | 'foreign_key';

export type MappingRule =
  | { kind: 'DirectCopy'; source: string }
  | { kind: 'Rename'; source: string; confidence: number; reason: MatchReason }
  | { kind: 'TypeCoerce'; source: string; conversions: ConversionId[]; confidence: number; reason: MatchReason }
  | { kind: 'DefaultFill'; value: FieldValue }
  | { kind: 'Drop' }
  | { kind: 'ManualOverride'; expressionId: string };

export type SourceRule = Extract<MappingRule, { source: string }>;

export type FieldRule = {
  field: string;
  rule: MappingRule;
};

export type UnresolvedField = {
  field: string;
  reason: 'unmatched' | 'ambiguous';
  /** Non-nullable without a default: restoring cannot proceed until this is resolved. */
  required: boolean;
  candidates: MatchCandidate[];
};

export type TableRuleSet = {
  table: string;
  sourceTable: string | null;
  rules: FieldRule[];
  unresolved: UnresolvedField[];
  droppedSourceFields: string[];
  coverage: number;
};

export type RuleSet = {
  sourceVersion: string;
  targetVersion: string;
  path: string[];
  tables: TableRuleSet[];
  droppedTables: string[];
  coverage: number;
};

/** Caller-supplied capability computing one target value from a source row. */
export type RowTransform = (sourceRow: Row) => FieldValue;

export type FieldOverride = { table: string; field: string } & (
  | { id: string; transform: RowTransform }
  | { drop: true }
);

export type Overrides = {
  fields?: FieldOverride[];
  /** Target table name → source table name feeding it. */
  tables?: Record<string, string>;
};

export const hasSource = (rule: MappingRule): rule is SourceRule => 'source' in rule;

export const confidenceOf = (rule: MappingRule) =>
  rule.kind === 'Rename' || rule.kind === 'TypeCoerce' ? rule.confidence : 1;

export const conversionsOf = (rule: SourceRule): ConversionId[] => (rule.kind === 'TypeCoerce' ? rule.conversions : []);

export const round2 = (n: number) => Math.round(n * 100) / 100;

export const ruleFor = (table: TableRuleSet, field: string) => table.rules.find(r => r.field === field)?.rule ?? null;

export const tableCoverage = (rules: number, unresolved: number) => {
  const total = rules + unresolved;
  return total ? round2(rules / total) : 1;
};

export const overallCoverage = (tables: TableRuleSet[]) => {
  const rules = tables.reduce((n, t) => n + t.rules.length, 0);
  const unresolved = tables.reduce((n, t) => n + t.unresolved.length, 0);
  return tableCoverage(rules, unresolved);
};

/** Builds a source-bearing rule, collapsing to DirectCopy when nothing changes. */
export const sourceRule = (
  target: string,
  source: string,
  conversions: ConversionId[],
  confidence: number,
  reason: MatchReason
): SourceRule => {
  if (conversions.length) return { kind: 'TypeCoerce', source, conversions, confidence: round2(confidence), reason };
  if (source === target) return { kind: 'DirectCopy', source };
  return { kind: 'Rename', source, confidence: round2(confidence), reason };
};
