/**
 * Step C financial decision: the feasibility estimate priced through the
 * Decision Engine and appended by finance_director.
 */

import type { CaseRecord } from '../case/case-record.js';
import { artifactsForRun } from '../case/projections.js';
import { evaluateFinancials } from '../decision/index.js';
import { InvalidInputError } from '../errors.js';
import { recordAudit } from '../storage/audit.js';
import { tierSchema } from '../types/schemas.js';
import type { FinancialDecision, ImplementationTier, PipelineConfig } from '../types/index.js';

export interface FinancialOverrides {
  tier?: ImplementationTier;
  hours?: number;
  hourly_rate?: number;
  pm_overhead_pct?: number;
  contract_value?: number | null;
}

/** Tier and hours from the run's feasibility artifact. */
export function feasibilityEstimate(record: CaseRecord, runId: string): { tier: ImplementationTier; hours: number } {
  const artifact = artifactsForRun(record.snapshot(), runId).get('technical_pm');
  if (!artifact) throw new InvalidInputError(`Run ${runId} has no feasibility artifact to price`, { run_id: runId });

  const tier = tierSchema.safeParse(artifact.findings.tier);
  const hours = artifact.findings.hours;
  if (!tier.success || typeof hours !== 'number') {
    throw new InvalidInputError(`Feasibility artifact for run ${runId} lacks a tier or hours estimate`, { run_id: runId });
  }
  return { tier: tier.data, hours };
}

export function recordFinancialDecision(
  record: CaseRecord,
  runId: string,
  decisionId: string,
  finance: PipelineConfig['finance'],
  overrides: FinancialOverrides = {},
): FinancialDecision {
  let tier = overrides.tier;
  let hours = overrides.hours;
  if (tier === undefined || hours === undefined) {
    const estimate = feasibilityEstimate(record, runId);
    tier = tier ?? estimate.tier;
    hours = hours ?? estimate.hours;
  }

  const decision = evaluateFinancials({
    decision_id: decisionId,
    tier,
    hours,
    hourly_rate: overrides.hourly_rate ?? finance.hourly_rate,
    pm_overhead_pct: overrides.pm_overhead_pct ?? finance.pm_overhead_pct,
    contract_value: overrides.contract_value !== undefined ? overrides.contract_value : record.intake().contract_value,
  });

  record.append({ kind: 'FinancialDecision', source_role: 'finance_director', payload: { run_id: runId, decision } });
  recordAudit('financial.decision', 'finance_director', 'financial_decision', decisionId, {
    run_id: runId, outcome: decision.outcome, margin: decision.computed_margin, target: decision.target_margin,
  }, record.assessmentId);
  return decision;
}
