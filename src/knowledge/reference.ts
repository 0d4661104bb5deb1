/**
 * Knowledge reference set: industry KPI table, solution catalog and SOC2
 * control table. Read-only, versioned JSON under the knowledge directory,
 * validated on load and cached per directory.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import { riskCategorySchema, riskSeveritySchema, tierSchema } from '../types/schemas.js';

const keywords = z.array(z.string().min(1)).min(1);

const industryTableSchema = z.object({
  version: z.string(),
  industries: z.array(z.object({
    id: z.string(),
    name: z.string(),
    keywords,
    kpis: z.array(z.string()),
  })),
});

const solutionCatalogSchema = z.object({
  version: z.string(),
  solutions: z.array(z.object({
    id: z.string(),
    name: z.string(),
    keywords,
    tier: tierSchema,
    base_hours: z.number().positive(),
  })),
});

const controlTableSchema = z.object({
  version: z.string(),
  data_elements: z.array(z.object({
    field: z.string(),
    keywords,
    entity: z.string(),
    category: riskCategorySchema,
    severity: riskSeveritySchema,
    control_id: z.string(),
    control: z.string(),
  })),
});

export type Industry = z.infer<typeof industryTableSchema>['industries'][number];
export type Solution = z.infer<typeof solutionCatalogSchema>['solutions'][number];
export type DataElement = z.infer<typeof controlTableSchema>['data_elements'][number];

export interface KnowledgeBase {
  versions: { industries: string; solutions: string; controls: string };
  industries: Industry[];
  solutions: Solution[];
  dataElements: DataElement[];
}

function readTable<T>(dir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = join(dir, file);
  if (!existsSync(path)) throw new InvalidInputError(`Knowledge table ${file} not found in ${dir}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new InvalidInputError(`Knowledge table ${file} is not valid JSON`, { cause: String(err) });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`Knowledge table ${file} is invalid`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

const _cache = new Map<string, KnowledgeBase>();

export function loadKnowledge(dir: string): KnowledgeBase {
  const cached = _cache.get(dir);
  if (cached) return cached;

  const industries = readTable(dir, 'industry-kpis.json', industryTableSchema);
  const solutions = readTable(dir, 'solution-catalog.json', solutionCatalogSchema);
  const controls = readTable(dir, 'soc2-controls.json', controlTableSchema);

  const kb: KnowledgeBase = {
    versions: { industries: industries.version, solutions: solutions.version, controls: controls.version },
    industries: industries.industries,
    solutions: solutions.solutions,
    dataElements: controls.data_elements,
  };
  _cache.set(dir, kb);
  return kb;
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/** Number of keywords that occur in the text, case-insensitively. */
export function keywordHits(text: string, words: readonly string[]): number {
  const haystack = text.toLowerCase();
  return words.filter((w) => haystack.includes(w.toLowerCase())).length;
}

/** Industry with the most keyword hits; ties go to the earlier table entry. */
export function matchIndustry(kb: KnowledgeBase, text: string): Industry | null {
  let best: Industry | null = null;
  let bestHits = 0;
  for (const industry of kb.industries) {
    const hits = keywordHits(text, industry.keywords);
    if (hits > bestHits) {
      best = industry;
      bestHits = hits;
    }
  }
  return best;
}

export function matchSolutions(kb: KnowledgeBase, text: string): Solution[] {
  return kb.solutions.filter((s) => keywordHits(text, s.keywords) > 0);
}

/** Data elements mentioned in the text or named directly by field id. */
export function matchDataElements(kb: KnowledgeBase, text: string, namedFields: readonly string[]): DataElement[] {
  const named = new Set(namedFields);
  return kb.dataElements.filter((e) => named.has(e.field) || keywordHits(text, e.keywords) > 0);
}
