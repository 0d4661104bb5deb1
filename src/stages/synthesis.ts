/**
 * Synthesis (document_architect): the compilation outline an external
 * renderer turns into the client document. Runs only after the gate passes.
 */

import { artifactsForRun, financialDecisionForRun, latestFinancialDecision, negotiations } from '../case/projections.js';
import { computeEfficiency } from '../decision/index.js';
import type { StageRunner } from './types.js';
import { buildArtifact, lowConfidence } from './types.js';

const SECTIONS = [
  'Executive Summary',
  'Strategic Targeting',
  'Technical Feasibility',
  'Compliance and Data Handling',
  'Vendor Engineering Margin Analysis',
  'Projected Efficiency Gains',
];

export const synthesisRunner: StageRunner = {
  async run(role, snapshot, sources, signal) {
    signal.throwIfAborted();
    const decision = financialDecisionForRun(snapshot, sources.run_id) ?? latestFinancialDecision(snapshot)?.payload.decision;
    if (!decision) return lowConfidence(role, 0, 'No financial decision to compile');

    const artifacts = artifactsForRun(snapshot, sources.run_id);
    const targeting = artifacts.get('outcomes_strategist');
    const feasibility = artifacts.get('technical_pm');
    const compliance = artifacts.get('legal_counsel');

    const mitigations = negotiations(snapshot).map((n) => ({
      risk_id: n.risk_id,
      status: n.status,
      mitigation: n.proposal?.mitigation ?? null,
      exclusion_scope: n.proposal?.exclusion_scope ?? [],
      human_resolution: n.human_resolution?.final_outcome ?? null,
    }));

    const runtimeMs = Math.max(0, sources.now().getTime() - Date.parse(sources.started_at));
    const efficiency = computeEfficiency(
      sources.finance.manual_baseline_hours, sources.finance.hourly_rate, runtimeMs / 3_600_000,
    );

    return buildArtifact(role, sources, {
      confidence: 1,
      findings: {
        sections: SECTIONS,
        targeting: targeting?.findings ?? null,
        feasibility: feasibility?.findings ?? null,
        compliance: compliance?.findings ?? null,
        mitigations,
        financial: {
          decision_id: decision.decision_id,
          tier: decision.tier,
          contract_value: decision.contract_value,
          estimated_cost: decision.estimated_cost,
          computed_margin: decision.computed_margin,
          target_margin: decision.target_margin,
          pricing_source: decision.pricing_source,
        },
        efficiency,
      },
    });
  },
};
