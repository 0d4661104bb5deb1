/**
 * Decision Engine facade.
 */

export {
  TARGET_MARGINS, targetMarginFor, computeMargin, marginGap, classifyMarginGap,
  recommendContractValue, evaluateFinancials, computeEfficiency,
} from './margin.js';
export type { FinancialInput, EfficiencyMetrics } from './margin.js';

export {
  MITIGATION_TYPES, MITIGATION_RULES, selectMitigation, validateMitigation, acceptableMitigations,
  conflictingRequiredFields, uncoveredFields, reviewProposal,
} from './mitigation.js';
export type { ProposalReview } from './mitigation.js';
