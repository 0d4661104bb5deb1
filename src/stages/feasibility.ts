/**
 * Feasibility (technical_pm): tiers the requested solutions and estimates hours.
 * The overall tier is the most demanding tier among the requested solutions.
 */

import { artifactsForRun } from '../case/projections.js';
import type { ImplementationTier } from '../types/index.js';
import type { StageRunner } from './types.js';
import { buildArtifact, lowConfidence, stringList } from './types.js';

const TIER_ORDER: readonly ImplementationTier[] = ['standard', 'configuration', 'customization', 'custom_build'];

export function highestTier(tiers: readonly ImplementationTier[]): ImplementationTier {
  let rank = 0;
  for (const tier of tiers) rank = Math.max(rank, TIER_ORDER.indexOf(tier));
  return TIER_ORDER[rank];
}

export const feasibilityRunner: StageRunner = {
  async run(role, snapshot, sources, signal) {
    signal.throwIfAborted();
    const targeting = artifactsForRun(snapshot, sources.run_id).get('outcomes_strategist');
    if (!targeting) return lowConfidence(role, 0, 'Targeting artifact missing for this run');

    const requested = new Set(stringList(targeting.findings.requested_solutions));
    const solutions = sources.knowledge.solutions.filter((s) => requested.has(s.id));
    if (solutions.length === 0) return lowConfidence(role, 0.3, 'No requested solution is in the catalog');

    const tier = highestTier(solutions.map((s) => s.tier));
    const customBuilds = solutions.filter((s) => s.tier === 'custom_build').map((s) => s.name);
    const breakdown: Record<string, number> = {};
    let hours = 0;
    for (const s of solutions) {
      breakdown[s.id] = s.base_hours;
      hours += s.base_hours;
    }

    return buildArtifact(role, sources, {
      flags: customBuilds.length > 0 ? ['custom_build_required'] : [],
      confidence: 0.9,
      findings: { tier, hours, solutions: solutions.map((s) => s.id), custom_builds: customBuilds, hours_breakdown: breakdown },
    });
  },
};
