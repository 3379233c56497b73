import { GoogleGenAI, Type } from '@google/genai';
import { z } from 'zod';
import { createModuleLogger } from '../logger';
import { findField, findTable } from '../types/schema';
import type { SchemaVersion } from '../types/schema';
import type { RuleSet } from './rules';

const log = createModuleLogger('suggest');

export type CoverageGapInput = {
  table: string;
  field: string;
  type: string;
  sourceTable: string;
  sourceFields: { name: string; type: string; tag?: string }[];
};

export type OverrideSuggestion = {
  table: string;
  field: string;
  sourceField: string | null;
  confidence: number;
  rationale: string;
};

export type SuggestionResponse = {
  summary: string;
  suggestions: OverrideSuggestion[];
};

/** Anything that turns a prompt into JSON text. */
export interface SuggestionClient {
  generate(prompt: string): Promise<string>;
}

const responseSchema = z.object({
  summary: z.string().default(''),
  suggestions: z
    .array(
      z.object({
        table: z.string(),
        field: z.string(),
        sourceField: z.string().nullable().optional(),
        confidence: z.number().min(0).max(1),
        rationale: z.string()
      })
    )
    .default([])
});

const cleanJson = (text: string) => text.replace(/```json/g, '').replace(/```/g, '').trim();

export const geminiClient = (apiKey: string, model: string): SuggestionClient => {
  const ai = new GoogleGenAI({ apiKey });
  return {
    generate: async prompt => {
      const response = await ai.models.generateContent({
        model,
        contents: prompt,
        config: {
          responseMimeType: 'application/json',
          responseSchema: {
            type: Type.OBJECT,
            properties: {
              summary: { type: Type.STRING },
              suggestions: {
                type: Type.ARRAY,
                items: {
                  type: Type.OBJECT,
                  properties: {
                    table: { type: Type.STRING },
                    field: { type: Type.STRING },
                    sourceField: { type: Type.STRING, nullable: true },
                    confidence: { type: Type.NUMBER },
                    rationale: { type: Type.STRING }
                  },
                  required: ['table', 'field', 'confidence', 'rationale']
                }
              }
            },
            required: ['summary', 'suggestions']
          }
        }
      });
      return response.text ?? '';
    }
  };
};

/** Target fields left unresolved by the rule set whose table is fed by a source table. */
export const coverageGaps = (ruleSet: RuleSet, source: SchemaVersion, target: SchemaVersion): CoverageGapInput[] =>
  ruleSet.tables.flatMap(t => {
    const sourceTable = t.sourceTable ? findTable(source, t.sourceTable) : undefined;
    const targetTable = findTable(target, t.table);
    if (!sourceTable || !targetTable) return [];
    return t.unresolved.map(gap => ({
      table: t.table,
      field: gap.field,
      type: findField(targetTable, gap.field)?.type ?? 'STRING',
      sourceTable: sourceTable.name,
      sourceFields: sourceTable.fields.map(f => ({ name: f.name, type: f.type, ...(f.tag ? { tag: f.tag } : {}) }))
    }));
  });

export const buildPrompt = (gaps: CoverageGapInput[]) => `
You are an expert database migration engineer.
A restore between two schema versions left these target fields without a source.
For each gap, pick the source field (from its source table) that should feed it, or null if none fits.

Gaps:
${JSON.stringify(gaps)}

Return JSON with:
- summary: one short sentence on how the gaps could be closed
- suggestions: one item per gap with table, field, sourceField (or null), confidence (0-1) and a short rationale.
`;

/**
 * Asks the model for source fields that could close coverage gaps. Suggestions
 * naming unknown gaps or source fields are discarded; nothing is applied.
 */
export const suggestOverrides = async (gaps: CoverageGapInput[], client: SuggestionClient): Promise<SuggestionResponse> => {
  if (!gaps.length) return { summary: 'No coverage gaps', suggestions: [] };
  const text = await client.generate(buildPrompt(gaps));
  if (!text) return { summary: '', suggestions: [] };

  let raw: unknown;
  try {
    raw = JSON.parse(cleanJson(text));
  } catch (err) {
    log.warn({ err }, 'suggestion response is not JSON');
    return { summary: '', suggestions: [] };
  }
  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.length }, 'suggestion response has an unexpected shape');
    return { summary: '', suggestions: [] };
  }

  const suggestions = parsed.data.suggestions.flatMap(s => {
    const gap = gaps.find(g => g.table === s.table && g.field === s.field);
    if (!gap) return [];
    const sourceField = s.sourceField && gap.sourceFields.some(f => f.name === s.sourceField) ? s.sourceField : null;
    return [{ table: s.table, field: s.field, sourceField, confidence: s.confidence, rationale: s.rationale }];
  });
  return { summary: parsed.data.summary, suggestions };
};
