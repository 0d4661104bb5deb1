/**
 * Targeting (outcomes_strategist): industry, KPIs and requested solutions,
 * by keyword lookup against the industry table and the solution catalog.
 */

import { matchIndustry, matchSolutions } from '../knowledge/index.js';
import type { StageRunner } from './types.js';
import { buildArtifact, lowConfidence } from './types.js';

export const targetingRunner: StageRunner = {
  async run(role, _snapshot, sources, signal) {
    signal.throwIfAborted();
    const text = `${sources.intake.client_context}\n${sources.intake.transcript}`;
    const industry = matchIndustry(sources.knowledge, text);
    const solutions = matchSolutions(sources.knowledge, text);

    const flags: string[] = [];
    if (!industry) flags.push('industry_unidentified');
    if (solutions.length === 0) flags.push('no_catalog_match');

    const artifact = buildArtifact(role, sources, {
      flags,
      confidence: 0.9,
      findings: {
        industry: industry?.id ?? null,
        industry_name: industry?.name ?? null,
        kpis: industry?.kpis ?? [],
        requested_solutions: solutions.map((s) => s.id),
        catalog_version: sources.knowledge.versions.solutions,
      },
    });

    if (solutions.length === 0) {
      return lowConfidence(role, industry ? 0.5 : 0.2, 'No catalog solution matched the transcript', artifact);
    }
    if (!industry) {
      return lowConfidence(role, 0.7, 'Industry could not be identified; KPIs omitted', artifact);
    }
    return artifact;
  },
};
