/**
 * Margin gate.
 *
 * Cost, margin and outcome rules for the financial decision that gates
 * final compilation. Everything here is pure; callers own persistence.
 */

import { InvalidInputError } from '../errors.js';
import type {
  FinancialDecision, FinancialOutcome, ImplementationTier, MarginResult,
} from '../types/index.js';

export const TARGET_MARGINS: Readonly<Record<ImplementationTier, number>> = {
  standard: 0.65,
  configuration: 0.55,
  customization: 0.45,
  custom_build: 0.35,
};

/** Ordered gap bands; the first band whose ceiling the gap does not exceed wins. */
const GAP_BANDS: ReadonlyArray<{ maxGap: number; outcome: FinancialOutcome }> = [
  { maxGap: 0.05, outcome: 'timeline_adjustment' },
  { maxGap: 0.10, outcome: 'scope_reduction' },
  { maxGap: 0.15, outcome: 'pricing_adjustment' },
];

const GAP_PRECISION = 1e9;

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${name} must be a finite, non-negative number`, { [name]: value });
  }
}

export function targetMarginFor(tier: ImplementationTier): number {
  return TARGET_MARGINS[tier];
}

export function computeMargin(
  hours: number, hourlyRate: number, pmOverheadPct: number, contractValue: number,
): MarginResult {
  requireNonNegative('hours', hours);
  requireNonNegative('hourly_rate', hourlyRate);
  requireNonNegative('pm_overhead_pct', pmOverheadPct);
  if (!Number.isFinite(contractValue) || contractValue <= 0) {
    throw new InvalidInputError('contract_value must be greater than zero', { contract_value: contractValue });
  }

  const implementationCost = hours * hourlyRate * (1 + pmOverheadPct);
  return { implementationCost, margin: (contractValue - implementationCost) / contractValue };
}

/** Target minus actual, rounded so decimal boundaries compare exactly. */
export function marginGap(margin: number, targetMargin: number): number {
  return Math.round((targetMargin - margin) * GAP_PRECISION) / GAP_PRECISION;
}

export function classifyMarginGap(margin: number, targetMargin: number): FinancialOutcome {
  if (!Number.isFinite(margin) || !Number.isFinite(targetMargin)) {
    throw new InvalidInputError('margin and target margin must be finite', { margin, target_margin: targetMargin });
  }
  if (margin >= targetMargin) return 'approved';

  const gap = marginGap(margin, targetMargin);
  for (const band of GAP_BANDS) {
    if (gap <= band.maxGap) return band.outcome;
  }
  return 'rejected';
}

/** Smallest contract value, rounded up to the cent, that meets the target margin. */
export function recommendContractValue(implementationCost: number, targetMargin: number): number {
  requireNonNegative('implementation_cost', implementationCost);
  if (!Number.isFinite(targetMargin) || targetMargin < 0 || targetMargin >= 1) {
    throw new InvalidInputError('target margin must be in [0, 1)', { target_margin: targetMargin });
  }
  return Math.ceil((implementationCost / (1 - targetMargin)) * 100) / 100;
}

export interface FinancialInput {
  decision_id: string;
  tier: ImplementationTier;
  hours: number;
  hourly_rate: number;
  pm_overhead_pct: number;
  /** Client budget; null prices the work at the recommended value instead. */
  contract_value: number | null;
}

export function evaluateFinancials(input: FinancialInput): FinancialDecision {
  const targetMargin = targetMarginFor(input.tier);

  let contractValue: number;
  let pricingSource: FinancialDecision['pricing_source'];
  if (input.contract_value === null) {
    requireNonNegative('hours', input.hours);
    requireNonNegative('hourly_rate', input.hourly_rate);
    requireNonNegative('pm_overhead_pct', input.pm_overhead_pct);
    const cost = input.hours * input.hourly_rate * (1 + input.pm_overhead_pct);
    contractValue = recommendContractValue(cost, targetMargin);
    pricingSource = 'recommended';
  } else {
    contractValue = input.contract_value;
    pricingSource = 'client_budget';
  }

  const { implementationCost, margin } = computeMargin(
    input.hours, input.hourly_rate, input.pm_overhead_pct, contractValue,
  );

  return {
    decision_id: input.decision_id,
    tier: input.tier,
    hours: input.hours,
    hourly_rate: input.hourly_rate,
    pm_overhead_pct: input.pm_overhead_pct,
    estimated_cost: implementationCost,
    contract_value: contractValue,
    pricing_source: pricingSource,
    computed_margin: margin,
    target_margin: targetMargin,
    gap: marginGap(margin, targetMargin),
    outcome: classifyMarginGap(margin, targetMargin),
  };
}

// ---------------------------------------------------------------------------
// Client-side efficiency
// ---------------------------------------------------------------------------

export interface EfficiencyMetrics {
  hours_saved: number;
  cost_saved: number;
  runtime_hours: number;
  manual_baseline_hours: number;
}

export function computeEfficiency(manualBaselineHours: number, hourlyRate: number, runtimeHours: number): EfficiencyMetrics {
  requireNonNegative('manual_baseline_hours', manualBaselineHours);
  requireNonNegative('hourly_rate', hourlyRate);
  requireNonNegative('runtime_hours', runtimeHours);
  const hoursSaved = Math.max(0, manualBaselineHours - runtimeHours);
  return {
    hours_saved: hoursSaved,
    cost_saved: hoursSaved * hourlyRate,
    runtime_hours: runtimeHours,
    manual_baseline_hours: manualBaselineHours,
  };
}
