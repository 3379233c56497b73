import { FerryError, schemaInvalid } from '../errors';
import type { MatchCandidate } from '../errors';
import { findTable, isRequired } from '../types/schema';
import type { FieldDef, SchemaVersion, TableDef } from '../types/schema';
import { parentsFirst } from '../utils/order';
import { nameSimilarity } from '../utils/similarity';
import { findConversion, inferableConversion } from './coerce';
import {
  hasSource,
  overallCoverage,
  round2,
  ruleFor,
  sourceRule,
  tableCoverage
} from './rules';
import type { FieldRule, MappingRule, RuleSet, TableRuleSet, UnresolvedField } from './rules';

export const DEFAULT_FUZZY_THRESHOLD = 0.8;

const TAG_CONFIDENCE = 0.95;
const TAG_COERCE_CONFIDENCE = 0.9;
const TYPE_CHANGE_CONFIDENCE = 0.9;
const FOREIGN_KEY_CONFIDENCE = 0.9;
const MAX_GAP_CANDIDATES = 3;

export type InferContext = {
  /** Rule sets of target tables already inferred; parents are inferred before children. */
  inferred: Map<string, TableRuleSet>;
  threshold: number;
};

type Scored = { field: FieldDef; score: number };

/** Highest scorer, or every top scorer when the best score is shared. */
const best = (scored: Scored[]): Scored[] => {
  if (!scored.length) return [];
  const top = Math.max(...scored.map(s => s.score));
  return scored.filter(s => s.score === top);
};

const asCandidates = (scored: Scored[], reason: string): MatchCandidate[] =>
  scored.map(s => ({ field: s.field.name, score: round2(s.score), reason }));

class TableInference {
  private readonly resolved = new Map<string, MappingRule>();
  private readonly ambiguous = new Map<string, MatchCandidate[]>();
  private readonly consumed = new Set<string>();

  constructor(
    private readonly source: TableDef | null,
    private readonly target: TableDef,
    private readonly ctx: InferContext
  ) {}

  run(): TableRuleSet {
    if (this.source) {
      this.exactMatch();
      this.tagMatch();
      this.typeChangeMatch();
      this.fuzzyMatch();
    }
    this.fallback();
    return this.result();
  }

  private get open(): FieldDef[] {
    return this.target.fields.filter(f => !this.resolved.has(f.name) && !this.ambiguous.has(f.name));
  }

  private get available(): FieldDef[] {
    return (this.source?.fields ?? []).filter(f => !this.consumed.has(f.name));
  }

  private take(target: FieldDef, rule: MappingRule) {
    this.resolved.set(target.name, rule);
    if (hasSource(rule)) this.consumed.add(rule.source);
  }

  // Phase 1: identical name, type and nullability.
  private exactMatch() {
    for (const field of this.open) {
      const match = this.available.find(
        f => f.name === field.name && f.type === field.type && f.nullable === field.nullable
      );
      if (match) this.take(field, { kind: 'DirectCopy', source: match.name });
    }
  }

  // Phase 2(a): identical semantic tag.
  private tagMatch() {
    for (const field of this.open) {
      if (!field.tag) continue;
      const scored = this.available
        .filter(f => f.tag === field.tag && (f.type === field.type || inferableConversion(f.type, field.type)))
        .map(f => ({ field: f, score: (f.type === field.type ? 1 : 0) + nameSimilarity(f.name, field.name) }));
      const top = best(scored);
      if (top.length > 1) {
        this.ambiguous.set(field.name, asCandidates(top, 'semantic_tag'));
        continue;
      }
      if (!top.length) continue;
      const match = top[0].field;
      const conversion = match.type === field.type ? null : inferableConversion(match.type, field.type);
      this.take(
        field,
        sourceRule(
          field.name,
          match.name,
          conversion ? [conversion] : [],
          conversion ? TAG_COERCE_CONFIDENCE : TAG_CONFIDENCE,
          'semantic_tag'
        )
      );
    }
  }

  // Phase 2(b): identical name, losslessly convertible type.
  private typeChangeMatch() {
    for (const field of this.open) {
      const match = this.available.find(f => f.name === field.name && f.type !== field.type);
      const conversion = match ? inferableConversion(match.type, field.type) : null;
      if (match && conversion) {
        this.take(field, sourceRule(field.name, match.name, [conversion], TYPE_CHANGE_CONFIDENCE, 'type_change'));
      }
    }
  }

  // Phase 2(c): similar name above the threshold, identical type.
  private fuzzyMatch() {
    for (const field of this.open) {
      const scored = this.available
        .filter(f => f.type === field.type)
        .map(f => ({ field: f, score: nameSimilarity(f.name, field.name) }))
        .filter(s => s.score >= this.ctx.threshold);
      const top = best(scored);
      if (top.length > 1) {
        this.ambiguous.set(field.name, asCandidates(top, 'fuzzy_name'));
        continue;
      }
      if (top.length) this.take(field, sourceRule(field.name, top[0].field.name, [], top[0].score, 'fuzzy_name'));
    }
  }

  // Phase 3: foreign-key cascade, then declared default or null.
  private fallback() {
    for (const field of this.open) {
      const cascaded = this.cascade(field);
      if (cascaded) {
        this.take(field, cascaded);
      } else if (field.default !== undefined) {
        this.take(field, { kind: 'DefaultFill', value: field.default });
      } else if (field.nullable) {
        this.take(field, { kind: 'DefaultFill', value: null });
      }
    }
  }

  private cascade(field: FieldDef): MappingRule | null {
    if (!this.source) return null;
    const fk = this.target.foreignKeys.find(k => k.field === field.name);
    if (!fk) return null;
    const parent = this.ctx.inferred.get(fk.references.table);
    if (!parent?.sourceTable) return null;
    const parentKey = ruleFor(parent, fk.references.field);
    if (!parentKey || !hasSource(parentKey)) return null;

    const parentSource = parent.sourceTable;
    const link = this.source.foreignKeys.find(
      k =>
        k.references.table === parentSource &&
        k.references.field === parentKey.source &&
        !this.consumed.has(k.field)
    );
    const sourceField = link ? this.source.fields.find(f => f.name === link.field) : undefined;
    if (!sourceField) return null;

    if (sourceField.type === field.type) {
      return sourceRule(field.name, sourceField.name, [], FOREIGN_KEY_CONFIDENCE, 'foreign_key');
    }
    const conversion = findConversion(sourceField.type, field.type);
    return conversion ? sourceRule(field.name, sourceField.name, [conversion], FOREIGN_KEY_CONFIDENCE, 'foreign_key') : null;
  }

  private gapCandidates(field: FieldDef): MatchCandidate[] {
    return this.available
      .map(f => ({ field: f.name, score: round2(nameSimilarity(f.name, field.name)), reason: `${f.type} source field` }))
      .filter(c => c.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, MAX_GAP_CANDIDATES);
  }

  private result(): TableRuleSet {
    const rules: FieldRule[] = [];
    const unresolved: UnresolvedField[] = [];
    for (const field of this.target.fields) {
      const rule = this.resolved.get(field.name);
      if (rule) {
        rules.push({ field: field.name, rule });
        continue;
      }
      const ambiguous = this.ambiguous.get(field.name);
      unresolved.push({
        field: field.name,
        reason: ambiguous ? 'ambiguous' : 'unmatched',
        required: isRequired(field),
        candidates: ambiguous ?? this.gapCandidates(field)
      });
    }
    return {
      table: this.target.name,
      sourceTable: this.source?.name ?? null,
      rules,
      unresolved,
      droppedSourceFields: this.available.map(f => f.name),
      coverage: tableCoverage(rules.length, unresolved.length)
    };
  }
}

/** Infers one target table's rules from the source table feeding it (null when the table is new). */
export const inferTableRules = (source: TableDef | null, target: TableDef, ctx: InferContext): TableRuleSet =>
  new TableInference(source, target, ctx).run();

/**
 * Infers a rule set directly between two versions. Tables are paired by name unless
 * `tableSources` names another source table for a target table.
 */
export const inferRuleSet = (
  sourceSchema: SchemaVersion,
  targetSchema: SchemaVersion,
  options: { threshold?: number; tableSources?: Record<string, string> } = {}
): RuleSet => {
  const ctx: InferContext = {
    inferred: new Map(),
    threshold: options.threshold ?? DEFAULT_FUZZY_THRESHOLD
  };

  for (const target of parentsFirst(targetSchema.tables)) {
    const sourceName = options.tableSources?.[target.name] ?? target.name;
    const source = findTable(sourceSchema, sourceName);
    if (options.tableSources?.[target.name] && !source) {
      throw schemaInvalid(`Source table ${sourceName} for ${target.name} does not exist in ${sourceSchema.version}`, {
        table: target.name,
        version: sourceSchema.version
      });
    }
    ctx.inferred.set(target.name, inferTableRules(source, target, ctx));
  }

  const tables = targetSchema.tables.map(t => {
    const rules = ctx.inferred.get(t.name);
    if (!rules) throw new FerryError('SchemaInvalid', `No rules inferred for ${t.name}`, { table: t.name });
    return rules;
  });
  const used = new Set(tables.map(t => t.sourceTable));

  return {
    sourceVersion: sourceSchema.version,
    targetVersion: targetSchema.version,
    path: [sourceSchema.version, targetSchema.version],
    tables,
    droppedTables: sourceSchema.tables.map(t => t.name).filter(n => !used.has(n)),
    coverage: overallCoverage(tables)
  };
};
