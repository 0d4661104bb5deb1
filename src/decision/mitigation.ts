/**
 * Mitigation policy.
 *
 * Table-driven: the selection rules are evaluated top-down and the first match
 * wins; validation is a fixed category x mitigation matrix. The negotiation
 * coordinator and orchestrator call these and never re-derive the rules.
 */

import type {
  DataCharacteristics, MitigationProposal, MitigationType, MitigationValidation, RiskCategory,
} from '../types/index.js';

export const MITIGATION_TYPES: readonly MitigationType[] = [
  'field_redaction', 'filtered_sql_view', 'synthetic_data_generation', 'data_masking',
];

interface MitigationRule {
  id: string;
  applies: (category: RiskCategory, data: DataCharacteristics) => boolean;
  mitigation: MitigationType;
}

export const MITIGATION_RULES: readonly MitigationRule[] = [
  { id: 'structure_only', applies: (_c, d) => d.structure_only, mitigation: 'synthetic_data_generation' },
  { id: 'excessive_access', applies: (c) => c === 'excessive_access', mitigation: 'filtered_sql_view' },
  { id: 'phi_dev_test', applies: (c, d) => c === 'phi_exposure' && d.dev_test_context, mitigation: 'synthetic_data_generation' },
  { id: 'dev_test', applies: (_c, d) => d.dev_test_context, mitigation: 'data_masking' },
  { id: 'colocated', applies: (_c, d) => d.pii_colocated_with_business_data, mitigation: 'filtered_sql_view' },
  { id: 'client_requires_pii', applies: (_c, d) => d.pii_required_by_client, mitigation: 'filtered_sql_view' },
  { id: 'default', applies: () => true, mitigation: 'field_redaction' },
];

export function selectMitigation(category: RiskCategory, data: DataCharacteristics): MitigationType {
  for (const rule of MITIGATION_RULES) {
    if (rule.applies(category, data)) return rule.mitigation;
  }
  return 'field_redaction';
}

const v = (satisfiesMinimization: boolean, satisfiesLeastPrivilege: boolean): MitigationValidation =>
  ({ satisfiesMinimization, satisfiesLeastPrivilege });

const VALIDATION_MATRIX: Readonly<Record<RiskCategory, Readonly<Record<MitigationType, MitigationValidation>>>> = {
  pii_exposure: {
    field_redaction: v(true, true),
    filtered_sql_view: v(true, true),
    synthetic_data_generation: v(true, true),
    data_masking: v(true, false),
  },
  phi_exposure: {
    field_redaction: v(true, true),
    filtered_sql_view: v(true, true),
    synthetic_data_generation: v(true, true),
    data_masking: v(false, false),
  },
  cross_border_transfer: {
    field_redaction: v(true, true),
    filtered_sql_view: v(false, true),
    synthetic_data_generation: v(true, true),
    data_masking: v(true, true),
  },
  excessive_access: {
    field_redaction: v(false, false),
    filtered_sql_view: v(true, true),
    synthetic_data_generation: v(false, true),
    data_masking: v(false, false),
  },
};

export function validateMitigation(mitigation: MitigationType, category: RiskCategory): MitigationValidation {
  return { ...VALIDATION_MATRIX[category][mitigation] };
}

/** The mitigations turn 1 offers: every type passing both checks for the category. */
export function acceptableMitigations(category: RiskCategory): MitigationType[] {
  return MITIGATION_TYPES.filter((m) => {
    const check = VALIDATION_MATRIX[category][m];
    return check.satisfiesMinimization && check.satisfiesLeastPrivilege;
  });
}

// ---------------------------------------------------------------------------
// Negotiation checks
// ---------------------------------------------------------------------------

const PERSONAL_DATA: ReadonlySet<RiskCategory> = new Set(['pii_exposure', 'phi_exposure']);

/**
 * A personal-data risk whose flagged fields the client insists on receiving
 * cannot be mitigated without removing what the client asked for.
 */
export function conflictingRequiredFields(
  category: RiskCategory, flaggedFields: readonly string[], requiredFields: readonly string[],
): string[] {
  if (!PERSONAL_DATA.has(category)) return [];
  const required = new Set(requiredFields);
  return flaggedFields.filter((f) => required.has(f));
}

export function uncoveredFields(flaggedFields: readonly string[], exclusionScope: readonly string[]): string[] {
  const excluded = new Set(exclusionScope);
  return flaggedFields.filter((f) => !excluded.has(f));
}

export interface ProposalReview {
  validation: MitigationValidation;
  covers_flagged_fields: boolean;
  uncovered_fields: string[];
  verdict: 'accept' | 'reject';
}

/** Final-review evaluation: both compliance checks and full coverage of the flagged fields. */
export function reviewProposal(
  category: RiskCategory, flaggedFields: readonly string[], proposal: MitigationProposal,
): ProposalReview {
  const validation = validateMitigation(proposal.mitigation, category);
  const uncovered = uncoveredFields(flaggedFields, proposal.exclusion_scope);
  const covers = uncovered.length === 0;
  const accept = validation.satisfiesMinimization && validation.satisfiesLeastPrivilege && covers;
  return { validation, covers_flagged_fields: covers, uncovered_fields: uncovered, verdict: accept ? 'accept' : 'reject' };
}
